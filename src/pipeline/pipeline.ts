import { join } from "node:path";
import { ConfigError, StageError } from "../utils/errors";
import { removeIfExists } from "../utils/fs";
import { checkFilterCollection, runFilterCollection } from "../filters/collection";
import { workspacePath, type RunContext } from "../filters/types";
import type { Profile } from "../config/types";
import { exportProject } from "./export";
import { WORKSPACE_DIRS, setupTmpFiles } from "./stage";

export function getProfile(ctx: RunContext): Profile {
  const profile = ctx.config.profiles.get(ctx.profile);
  if (!profile) {
    throw new ConfigError(`Profile "${ctx.profile}" does not exist in the configuration.`);
  }
  return profile;
}

export async function removeWorkspaceData(ctx: RunContext) {
  const dataPath = join(workspacePath(ctx), WORKSPACE_DIRS.data);
  try {
    await removeIfExists(dataPath);
  } catch (err) {
    throw new StageError(`Unable to clean the "${dataPath}" directory.`, { cause: err });
  }
}

/**
 * Runs the profile of `ctx` end to end: check every filter, stage the
 * workspace, run the filters, export, drop the workspace data. A phase
 * starts only after the previous one finished for the whole collection.
 */
export async function runProfile(ctx: RunContext) {
  const profile = getProfile(ctx);
  const { logger } = ctx;

  await checkFilterCollection(profile, ctx);

  try {
    await setupTmpFiles(ctx.config, ctx.absoluteLocation, workspacePath(ctx), logger);
  } catch (err) {
    throw new StageError("Unable to setup profile.", { cause: err });
  }

  await runFilterCollection(profile, ctx);

  logger.info("Moving files to target directory.");
  const start = Date.now();
  await exportProject(ctx.config, profile.exportTarget, ctx.absoluteLocation, workspacePath(ctx), ctx.settings, logger);
  logger.debug(`Done in ${Date.now() - start}ms`);

  await removeWorkspaceData(ctx);
}
