import { InstallError, wrapError } from "../utils/errors";
import { configFromObject, loadConfigFile, saveConfigFile } from "../config/config";
import type { ConfigFile } from "../config/schema";
import { withSessionLock } from "../lock/session-lock";
import { RemoteFilterInstaller } from "../filters/remote-filter";
import { forEachQueued, installAllFilters, installFilter, type InstallEnv } from "../remote/install";
import { resolveVersion } from "../remote/resolve";
import { parseInstallSpecifiers } from "../remote/specifier";
import { gitClient, openSession, warnIfNoGit, type CommandOptions, type Session } from "./session";
import type { GitClient } from "../utils/git";

export interface InstallOptions extends CommandOptions {
  /** reinstall, and overwrite existing `filterDefinitions` entries */
  force?: boolean;
}

async function loadConfigFileOrFail(session: Session): Promise<ConfigFile> {
  try {
    return await loadConfigFile(session.projectRoot);
  } catch (err) {
    throw wrapError(err, 'Could not load "config.json".');
  }
}

function installEnv(session: Session, file: ConfigFile, git: GitClient): InstallEnv {
  return {
    projectRoot: session.projectRoot,
    dotRegolithPath: session.dotRegolithPath,
    dataPath: file.regolith.dataPath,
    git,
    logger: session.logger,
  };
}

/**
 * `regolith install`: downloads filters from their repositories and adds
 * them to `filterDefinitions`. Filters that are already defined need
 * `force`.
 */
export async function install(specs: readonly string[], opts: InstallOptions = {}) {
  const session = openSession(opts);
  const { logger } = session;
  const force = opts.force ?? false;
  logger.info("Installing filters...");
  const git = gitClient(session, opts);
  await warnIfNoGit(git, logger);

  const requests = parseInstallSpecifiers(specs);
  const file = await loadConfigFileOrFail(session);
  const definitions = file.regolith.filterDefinitions;

  await withSessionLock(
    session.dotRegolithPath,
    async () => {
      if (!force) {
        for (const request of requests) {
          if (Object.hasOwn(definitions, request.name)) {
            throw new InstallError(
              `The filter is already on the filter definitions list.\nFilter: ${request.name}\n` +
                'If you want to force the installation of the filter, add the "--force" flag to "regolith install".'
            );
          }
        }
      }

      const env = installEnv(session, file, git);
      const installed = new Map<string, RemoteFilterInstaller>();
      await forEachQueued(requests, async (request) => {
        const resolved = await resolveVersion(git, request.url, request.name, request.version);
        const installer = new RemoteFilterInstaller(request.name, request.url, resolved.version);
        await installFilter(installer, resolved, env, force);
        installed.set(request.name, installer);
      }, env.concurrency);

      for (const request of requests) {
        const installer = installed.get(request.name);
        if (installer) {
          definitions[request.name] = installer.toObject();
        }
      }
      try {
        await saveConfigFile(session.projectRoot, file);
      } catch (err) {
        throw new InstallError(
          `Successfully downloaded ${requests.length} filters but failed to update the config file.\n` +
            'Run "regolith clean" to fix invalid cache state.',
          { cause: err }
        );
      }
    },
    logger
  );
  logger.info("Successfully installed the filters.");
}

/**
 * `regolith install-all`: brings the cache in line with every remote filter
 * of `filterDefinitions`.
 */
export async function installAll(opts: InstallOptions = {}) {
  const session = openSession(opts);
  const { logger } = session;
  logger.info("Installing filters...");
  const git = gitClient(session, opts);
  await warnIfNoGit(git, logger);

  const file = await loadConfigFileOrFail(session);
  let remote: RemoteFilterInstaller[];
  try {
    remote = [...configFromObject(file).filterDefinitions.values()].filter(
      (installer): installer is RemoteFilterInstaller => installer instanceof RemoteFilterInstaller
    );
  } catch (err) {
    throw wrapError(err, 'Could not load "config.json".');
  }

  await withSessionLock(
    session.dotRegolithPath,
    async () => {
      try {
        await installAllFilters(remote, installEnv(session, file, git), opts.force ?? false);
      } catch (err) {
        throw wrapError(err, "Could not install filters.");
      }
    },
    logger
  );
  logger.info("Successfully installed the filters.");
}

export { installEnv, loadConfigFileOrFail };
