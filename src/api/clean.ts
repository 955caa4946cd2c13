import { promises as fsp } from "node:fs";
import { join } from "node:path";
import { wrapError } from "../utils/errors";
import { exists, removeIfExists } from "../utils/fs";
import { DOT_REGOLITH, appDataRoot, getDotRegolith } from "../config/paths";
import { openSession, type CommandOptions } from "./session";

export interface CleanOptions extends CommandOptions {
  /** wipe the cache of every project kept in the user cache directory */
  userCache?: boolean;
}

export interface CleanResult {
  removed: string[];
}

/**
 * `regolith clean`: deletes the cache of the project, both the local
 * `.regolith` folder and its copy in the user cache directory. With
 * `userCache`, the user cache of all projects is emptied instead.
 */
export async function clean(opts: CleanOptions = {}): Promise<CleanResult> {
  const session = openSession(opts);
  const { logger } = session;
  const removed: string[] = [];

  const remove = async (path: string) => {
    if (!(await exists(path))) { return; }
    try {
      await removeIfExists(path);
    } catch (err) {
      throw wrapError(err, `Failed to remove ${path}.`);
    }
    removed.push(path);
  };

  if (opts.userCache) {
    const root = appDataRoot(session.env);
    logger.info("Cleaning the user cache...");
    await remove(root);
    await fsp.mkdir(root, { recursive: true });
  } else {
    logger.info("Cleaning the project cache...");
    await remove(join(session.projectRoot, DOT_REGOLITH));
    await remove(getDotRegolith(session.projectRoot, true, session.env));
  }

  logger.info("Cache cleaned.", { removed });
  return { removed };
}
