import crypto from 'node:crypto';
import os from 'node:os';
import { join, resolve } from 'node:path';

export const DOT_REGOLITH = '.regolith';
const APP_DATA_DIR = 'regolith';

/** Per-user cache directory of the platform. */
export function userCacheDir(env: NodeJS.ProcessEnv = process.env) {
  switch (process.platform) {
    case 'win32':
      return env.LOCALAPPDATA ?? join(os.homedir(), 'AppData', 'Local');
    case 'darwin':
      return join(os.homedir(), 'Library', 'Caches');
    default:
      return env.XDG_CACHE_HOME ?? join(os.homedir(), '.cache');
  }
}

/** Root of everything regolith keeps in the user cache directory. */
export function appDataRoot(env: NodeJS.ProcessEnv = process.env) {
  return join(userCacheDir(env), APP_DATA_DIR);
}

/**
 * Cache root of a project: `<project>/.regolith`, or a directory in the
 * user cache keyed by the hash of the project path.
 */
export function getDotRegolith(projectRoot: string, useAppData: boolean, env: NodeJS.ProcessEnv = process.env) {
  const root = resolve(projectRoot);
  if (!useAppData) {
    return join(root, DOT_REGOLITH);
  }
  const key = crypto.createHash('sha1').update(root).digest('hex');
  return join(appDataRoot(env), 'project-cache', key);
}
