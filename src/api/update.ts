import { wrapError } from "../utils/errors";
import { configFromObject } from "../config/config";
import type { Config } from "../config/types";
import { withSessionLock } from "../lock/session-lock";
import { RemoteFilterInstaller } from "../filters/remote-filter";
import { updateFilters } from "../remote/install";
import { installEnv, loadConfigFileOrFail } from "./install";
import { gitClient, openSession, warnIfNoGit, type CommandOptions } from "./session";
import type { Logger } from "../utils/logger";

function pickRemote(config: Config, names: readonly string[], logger: Logger) {
  const picked: RemoteFilterInstaller[] = [];
  for (const name of new Set(names)) {
    const installer = config.filterDefinitions.get(name);
    if (!installer) {
      logger.warn(`Filter "${name}" is not on the "filterDefinitions" list, skipping.`);
      continue;
    }
    if (!(installer instanceof RemoteFilterInstaller)) {
      logger.warn(`Filter "${name}" is not a remote filter, skipping.`);
      continue;
    }
    picked.push(installer);
  }
  return picked;
}

async function updateSelected(
  opts: CommandOptions,
  select: (config: Config, logger: Logger) => RemoteFilterInstaller[]
) {
  const session = openSession(opts);
  const { logger } = session;
  logger.info("Updating filters...");
  const git = gitClient(session, opts);
  await warnIfNoGit(git, logger);

  const file = await loadConfigFileOrFail(session);
  let selected: RemoteFilterInstaller[];
  try {
    selected = select(configFromObject(file), logger);
  } catch (err) {
    throw wrapError(err, 'Could not load "config.json".');
  }
  if (selected.length === 0) {
    logger.info("No filters to update.");
    return;
  }

  await withSessionLock(
    session.dotRegolithPath,
    async () => {
      try {
        await updateFilters(selected, installEnv(session, file, git));
      } catch (err) {
        throw wrapError(err, "Could not update filters.");
      }
    },
    logger
  );
  logger.info("Successfully updated the filters.");
}

/**
 * `regolith update`: re-resolves the named remote filters, pinned ones
 * included, and downloads those whose resolved version is not in the cache.
 */
export async function update(names: readonly string[], opts: CommandOptions = {}) {
  await updateSelected(opts, (config, logger) => pickRemote(config, names, logger));
}

/**
 * `regolith update-all`: like `update` for every remote filter that tracks
 * `HEAD` or `latest`. Pinned versions are left alone.
 */
export async function updateAll(opts: CommandOptions = {}) {
  await updateSelected(opts, (config, logger) =>
    [...config.filterDefinitions.values()].filter((installer): installer is RemoteFilterInstaller => {
      if (!(installer instanceof RemoteFilterInstaller)) { return false; }
      if (!installer.isVersionTracking()) {
        logger.debug(`Filter "${installer.name}" is pinned to ${installer.version}, skipping.`);
        return false;
      }
      return true;
    })
  );
}
