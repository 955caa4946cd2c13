import { promises as fsp } from "node:fs";
import { join, resolve } from "node:path";
import { StageError, errnoCode } from "../utils/errors";
import { copyDir, removeIfExists } from "../utils/fs";
import type { Logger } from "../utils/logger";
import type { Config } from "../config/types";

/** Workspace subdirectory per pack role. */
export const WORKSPACE_DIRS = {
  resource: "RP",
  behavior: "BP",
  data: "data",
} as const;

export type PackRole = keyof typeof WORKSPACE_DIRS;

export const PACK_ROLES: readonly PackRole[] = ["resource", "behavior", "data"];

const DESCRIPTIONS: Record<PackRole, string> = {
  resource: "resource folder",
  behavior: "behavior folder",
  data: "data folder",
};

export function sourcePaths(config: Config): Record<PackRole, string> {
  return {
    resource: config.packs.resourceFolder,
    behavior: config.packs.behaviorFolder,
    data: config.dataPath,
  };
}

async function stageDirectory(role: PackRole, source: string, projectRoot: string, workspace: string, logger: Logger) {
  const target = join(workspace, WORKSPACE_DIRS[role]);
  const description = DESCRIPTIONS[role];
  if (source === "") {
    await fsp.mkdir(target, { recursive: true });
    return;
  }
  const abs = resolve(projectRoot, source);
  let isDir: boolean;
  try {
    isDir = (await fsp.stat(abs)).isDirectory();
  } catch (err) {
    if (errnoCode(err) !== "ENOENT") {
      throw new StageError(`Could not read the ${description} "${source}".`, { cause: err });
    }
    logger.warn(`The ${description} "${source}" does not exist, using an empty directory.`);
    await fsp.mkdir(target, { recursive: true });
    return;
  }
  if (!isDir) {
    throw new StageError(`The ${description} path "${source}" is not a directory.`);
  }
  try {
    await copyDir(abs, target);
  } catch (err) {
    throw new StageError(`Failed to copy the ${description} "${source}" to "${target}".`, { cause: err });
  }
}

/**
 * Recreates the workspace and fills it with copies of the resource pack,
 * behavior pack and data folders. Missing sources become empty
 * directories so every filter sees the same layout.
 */
export async function setupTmpFiles(config: Config, projectRoot: string, workspace: string, logger: Logger) {
  const start = Date.now();
  logger.debug(`Cleaning ${workspace}`);
  try {
    await removeIfExists(workspace);
    await fsp.mkdir(workspace, { recursive: true });
  } catch (err) {
    throw new StageError(`Unable to prepare the temporary directory "${workspace}".`, { cause: err });
  }

  const sources = sourcePaths(config);
  for (const role of PACK_ROLES) {
    await stageDirectory(role, sources[role], projectRoot, workspace, logger);
  }
  logger.debug(`Setup done in ${Date.now() - start}ms`);
}
