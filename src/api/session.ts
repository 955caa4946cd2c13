import { resolve } from "node:path";
import { loadSettings, type Settings } from "../config/settings";
import { getDotRegolith } from "../config/paths";
import { createLogger, type Logger } from "../utils/logger";
import { createGitClient, type GitClient } from "../utils/git";
import type { Config } from "../config/types";
import type { RunContext } from "../filters/types";

export interface CommandOptions {
  /** project root, defaults to the working directory */
  cwd?: string;
  /** shorthand for a debug-level logger */
  debug?: boolean;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  git?: GitClient;
}

/** What every command works with, resolved once at its start. */
export interface Session {
  projectRoot: string;
  settings: Settings;
  logger: Logger;
  dotRegolithPath: string;
  env: NodeJS.ProcessEnv;
}

export function openSession(opts: CommandOptions = {}): Session {
  const env = opts.env ?? process.env;
  const settings = loadSettings(env);
  const projectRoot = resolve(opts.cwd ?? process.cwd());
  const logger = opts.logger ?? createLogger(opts.debug ? "debug" : settings.logLevel);
  return {
    projectRoot,
    settings,
    logger,
    dotRegolithPath: getDotRegolith(projectRoot, settings.useAppData, env),
    env,
  };
}

export function gitClient(session: Session, opts: CommandOptions): GitClient {
  return opts.git ?? createGitClient(session.logger);
}

/**
 * Warns when git is missing. Installing may still work for some sources,
 * the steps that need git fail on their own later.
 */
export async function warnIfNoGit(git: GitClient, logger: Logger) {
  if (!(await git.isAvailable())) {
    logger.warn("Git is not installed. Filters that have to be downloaded with git cannot be installed or updated.");
  }
}

export function createRunContext(session: Session, config: Config, profile: string): RunContext {
  return {
    config,
    profile,
    absoluteLocation: session.projectRoot,
    dotRegolithPath: session.dotRegolithPath,
    settings: session.settings,
    logger: session.logger,
  };
}
