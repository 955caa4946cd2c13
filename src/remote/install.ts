import { join, resolve } from "node:path";
import PQueue from "p-queue";
import { InstallError, RegolithError, errorMessage } from "../utils/errors";
import { copyDir, exists, isDirectory, removeIfExists, writeJson } from "../utils/fs";
import type { GitClient } from "../utils/git";
import type { Logger } from "../utils/logger";
import { FILTER_DESCRIPTOR, readFilterDescriptor } from "../filters/subfilters";
import type { RemoteFilterInstaller } from "../filters/remote-filter";
import { resolveVersion, type ResolvedVersion } from "./resolve";

export const DEFAULT_INSTALL_CONCURRENCY = 4;

export interface InstallEnv {
  projectRoot: string;
  dotRegolithPath: string;
  /** project data path; filters that ship a `data/` folder get a copy in it */
  dataPath: string;
  git: GitClient;
  logger: Logger;
  concurrency?: number;
}

/**
 * Version recorded in the cached `filter.json`, or null when the filter is
 * not in the cache (or its descriptor cannot be read).
 */
export async function installedVersion(installer: RemoteFilterInstaller, dotRegolithPath: string, logger?: Logger) {
  const path = installer.downloadPath(dotRegolithPath);
  if (!(await isDirectory(path))) { return null; }
  try {
    return (await readFilterDescriptor(path)).version ?? null;
  } catch (err) {
    logger?.debug("Cached filter has an unreadable descriptor", { filter: installer.name, error: errorMessage(err) });
    return null;
  }
}

async function writeInstalledVersion(downloadPath: string, version: string) {
  const descriptor = await readFilterDescriptor(downloadPath);
  await writeJson(join(downloadPath, FILTER_DESCRIPTOR), { ...descriptor, version });
}

async function copyFilterData(installer: RemoteFilterInstaller, downloadPath: string, env: InstallEnv) {
  const source = join(downloadPath, "data");
  if (env.dataPath === "" || !(await isDirectory(source))) { return; }
  const target = resolve(env.projectRoot, env.dataPath, installer.name);
  if (await exists(target)) {
    env.logger.debug("Filter data already present in the project", { filter: installer.name, target });
    return;
  }
  await copyDir(source, target);
  env.logger.info(`Copied the data of filter "${installer.name}" to ${target}`);
}

function describeRef(resolved: ResolvedVersion) {
  return resolved.ref.type === "tag" ? `tag ${resolved.ref.name}` : `commit ${resolved.ref.sha}`;
}

/**
 * Downloads a resolved filter into its cache directory, replacing what was
 * there. The checkout goes through a scratch directory of its own, so
 * distinct filters can download at the same time.
 */
export async function downloadFilter(installer: RemoteFilterInstaller, resolved: ResolvedVersion, env: InstallEnv) {
  const dest = installer.downloadPath(env.dotRegolithPath);
  const staging = join(env.dotRegolithPath, "cache", "downloads", installer.name);
  env.logger.info(`Downloading filter "${installer.name}" (${describeRef(resolved)})`);
  try {
    await removeIfExists(staging);
    await env.git.checkout(installer.url, resolved.ref, staging);
    const source = join(staging, installer.name);
    if (!(await isDirectory(source))) {
      throw new InstallError(`Filter "${installer.name}" was not found in ${installer.url} at ${describeRef(resolved)}.`);
    }
    await removeIfExists(dest);
    await copyDir(source, dest);
    await writeInstalledVersion(dest, resolved.installedVersion);
    await copyFilterData(installer, dest, env);
  } catch (err) {
    throw new InstallError(`Failed to download filter "${installer.name}" from ${installer.url}.`, { cause: err });
  } finally {
    await removeIfExists(staging);
  }
}

/**
 * Resolves and downloads a filter unless the cache already holds the
 * resolved version. Resolves to whether a download happened.
 */
export async function installFilter(
  installer: RemoteFilterInstaller,
  resolved: ResolvedVersion,
  env: InstallEnv,
  force: boolean
): Promise<boolean> {
  const current = await installedVersion(installer, env.dotRegolithPath, env.logger);
  if (!force && current === resolved.installedVersion) {
    env.logger.info(`Filter "${installer.name}" ${current} is already installed.`);
    return false;
  }
  await downloadFilter(installer, resolved, env);
  return true;
}

/**
 * Runs `task` for every item on a bounded queue. Every task is allowed to
 * settle before the first failure is rethrown, so nothing keeps writing to
 * the cache after this returns.
 */
export async function forEachQueued<T>(items: readonly T[], task: (item: T) => Promise<void>, concurrency = DEFAULT_INSTALL_CONCURRENCY) {
  const queue = new PQueue({ concurrency });
  const results = await Promise.allSettled(items.map((item) => queue.add(() => task(item))));
  const failure = results.find((result): result is PromiseRejectedResult => result.status === "rejected");
  if (failure) {
    throw failure.reason instanceof RegolithError
      ? failure.reason
      : new InstallError("Filter installation failed.", { cause: failure.reason });
  }
}

/**
 * Installs the filters of `filterDefinitions` that are not in the cache yet.
 * Pinned filters are also reinstalled when the cache holds another version.
 */
export async function installAllFilters(installers: readonly RemoteFilterInstaller[], env: InstallEnv, force: boolean) {
  await forEachQueued(
    installers,
    async (installer) => {
      const current = await installedVersion(installer, env.dotRegolithPath, env.logger);
      if (!force && current !== null && (installer.isVersionTracking() || current === installer.version)) {
        env.logger.info(`Filter "${installer.name}" is already installed (${current}).`);
        return;
      }
      const resolved = await resolveVersion(env.git, installer.url, installer.name, installer.version);
      await installFilter(installer, resolved, env, force);
    },
    env.concurrency
  );
}

/**
 * Re-resolves the version of each filter and downloads it when the cache
 * holds a different one.
 */
export async function updateFilters(installers: readonly RemoteFilterInstaller[], env: InstallEnv) {
  await forEachQueued(
    installers,
    async (installer) => {
      const resolved = await resolveVersion(env.git, installer.url, installer.name, installer.version);
      const updated = await installFilter(installer, resolved, env, false);
      if (updated) {
        env.logger.info(`Filter "${installer.name}" updated to ${resolved.installedVersion}.`);
      }
    },
    env.concurrency
  );
}
