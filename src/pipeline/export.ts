import { join, resolve } from "node:path";
import { ExportError } from "../utils/errors";
import { makeReadOnly, moveDir, removeIfExists } from "../utils/fs";
import type { Logger } from "../utils/logger";
import type { Config, ExportTarget } from "../config/types";
import type { Settings } from "../config/settings";
import { PACK_ROLES, WORKSPACE_DIRS, sourcePaths } from "./stage";

export interface ExportPaths {
  resource: string;
  behavior: string;
}

export function comMojangPath(settings: Settings, env: NodeJS.ProcessEnv = process.env): string {
  if (settings.comMojangPath) { return settings.comMojangPath; }
  if (process.platform === "win32" && env.LOCALAPPDATA) {
    return join(env.LOCALAPPDATA, "Packages", "Microsoft.MinecraftUWP_8wekyb3d8bbwe", "LocalState", "games", "com.mojang");
  }
  throw new ExportError(
    'Unable to find the "com.mojang" folder for the "development" export target. ' +
      "Set the COM_MOJANG environment variable to its location."
  );
}

/**
 * Destination directories of the packs for an export target.
 */
export function getExportPaths(config: Config, target: ExportTarget, projectRoot: string, settings: Settings): ExportPaths {
  const name = config.name;
  switch (target.target) {
    case "local":
      return {
        resource: resolve(projectRoot, "build", `${name}_rp`),
        behavior: resolve(projectRoot, "build", `${name}_bp`),
      };
    case "exact":
      if (!target.rpPath || !target.bpPath) {
        throw new ExportError('The "exact" export target requires both "rpPath" and "bpPath".');
      }
      return {
        resource: resolve(projectRoot, target.rpPath),
        behavior: resolve(projectRoot, target.bpPath),
      };
    case "development": {
      const comMojang = comMojangPath(settings);
      return {
        resource: join(comMojang, "development_resource_packs", `${name}_rp`),
        behavior: join(comMojang, "development_behavior_packs", `${name}_bp`),
      };
    }
  }
}

async function replaceDir(src: string, dest: string, what: string) {
  try {
    await removeIfExists(dest);
    await moveDir(src, dest);
  } catch (err) {
    throw new ExportError(`Failed to export the ${what} to "${dest}".`, { cause: err });
  }
}

/**
 * Delivers the workspace packs to the export target, replacing what the
 * previous export left there.
 */
export async function exportProject(
  config: Config,
  target: ExportTarget,
  projectRoot: string,
  workspace: string,
  settings: Settings,
  logger: Logger
) {
  const paths = getExportPaths(config, target, projectRoot, settings);
  logger.debug("Export paths", { ...paths, readOnly: target.readOnly });
  await replaceDir(join(workspace, WORKSPACE_DIRS.resource), paths.resource, "resource pack");
  await replaceDir(join(workspace, WORKSPACE_DIRS.behavior), paths.behavior, "behavior pack");
  if (target.readOnly) {
    try {
      await makeReadOnly(paths.resource);
      await makeReadOnly(paths.behavior);
    } catch (err) {
      throw new ExportError("Failed to make the exported packs read-only.", { cause: err });
    }
  }
  return paths;
}

/**
 * Overwrites the project's own source directories with the workspace
 * content. Used when a single filter runs as a tool.
 */
export async function inplaceExportProject(config: Config, projectRoot: string, workspace: string, logger: Logger) {
  const sources = sourcePaths(config);
  for (const role of PACK_ROLES) {
    if (sources[role] === "") { continue; }
    const dest = resolve(projectRoot, sources[role]);
    logger.debug(`Overwriting ${dest}`);
    await replaceDir(join(workspace, WORKSPACE_DIRS[role]), dest, `${role} folder`);
  }
}
