import { ConfigError, wrapError } from "../utils/errors";
import { loadConfig } from "../config/config";
import { withSessionLock } from "../lock/session-lock";
import { runProfile } from "../pipeline/pipeline";
import { watchProfile, watchSourceFiles, type ChangeSource } from "../watch/watch";
import { sourcePaths } from "../pipeline/stage";
import { createRunContext, openSession, type CommandOptions, type Session } from "./session";
import type { Config } from "../config/types";

export const DEFAULT_PROFILE = "default";

async function loadProfileConfig(session: Session, profileName: string): Promise<Config> {
  let config: Config;
  try {
    config = await loadConfig(session.projectRoot);
  } catch (err) {
    throw wrapError(err, 'Could not load "config.json".');
  }
  if (!config.profiles.has(profileName)) {
    throw new ConfigError(`Profile "${profileName}" does not exist in the configuration.`);
  }
  return config;
}

/**
 * `regolith run`: runs a profile once and exports its packs.
 */
export async function run(profileName: string = DEFAULT_PROFILE, opts: CommandOptions = {}) {
  const session = openSession(opts);
  const config = await loadProfileConfig(session, profileName);
  await withSessionLock(
    session.dotRegolithPath,
    async () => {
      try {
        await runProfile(createRunContext(session, config, profileName));
      } catch (err) {
        throw wrapError(err, `Failed to run profile "${profileName}".`);
      }
    },
    session.logger
  );
  session.logger.info(`Successfully ran the "${profileName}" profile.`);
}

export interface WatchCommandOptions extends CommandOptions {
  /** stops the loop between two runs */
  signal: AbortSignal;
  /** replaces the file system watcher on the source folders */
  source?: ChangeSource;
}

/**
 * `regolith watch`: runs a profile, then again on every change of the
 * source folders until `signal` aborts.
 */
export async function watch(profileName: string = DEFAULT_PROFILE, opts: WatchCommandOptions) {
  const session = openSession(opts);
  const config = await loadProfileConfig(session, profileName);
  await withSessionLock(
    session.dotRegolithPath,
    async () => {
      const source = opts.source ?? watchSourceFiles(session.projectRoot, Object.values(sourcePaths(config)), session.logger);
      await watchProfile(createRunContext(session, config, profileName), { signal: opts.signal, source, run: runProfile });
    },
    session.logger
  );
}
