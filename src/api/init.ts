import { promises as fsp } from "node:fs";
import { join } from "node:path";
import { ConfigError, errnoCode, wrapError } from "../utils/errors";
import { isDirEmpty } from "../utils/fs";
import { saveConfigFile } from "../config/config";
import { CONFIG_SCHEMA_URL, type ConfigFile } from "../config/schema";
import { DEFAULT_PROFILE } from "./run";
import { openSession, type CommandOptions } from "./session";

export interface InitOptions extends CommandOptions {
  /** initialize even if the directory is not empty */
  force?: boolean;
}

const GITIGNORE = "/build\n/.regolith\n";

export function defaultConfigFile(): ConfigFile {
  return {
    $schema: CONFIG_SCHEMA_URL,
    name: "Project name",
    author: "Your name",
    packs: {
      behaviorPack: "./packs/BP",
      resourcePack: "./packs/RP",
    },
    regolith: {
      dataPath: "./packs/data",
      filterDefinitions: {},
      profiles: {
        [DEFAULT_PROFILE]: {
          filters: [],
          export: { target: "local", readOnly: false },
        },
      },
    },
  };
}

async function ensureEmpty(projectRoot: string) {
  try {
    if (!(await isDirEmpty(projectRoot))) {
      throw new ConfigError(
        `Cannot initialize the project in a non-empty directory: ${projectRoot}\n` +
          'Use "--force" to initialize it anyway.'
      );
    }
  } catch (err) {
    if (errnoCode(err) === "ENOENT") { return; }
    throw err;
  }
}

/**
 * `regolith init`: creates `config.json`, `.gitignore` and the pack folders
 * of a new project.
 */
export async function init(opts: InitOptions = {}) {
  const session = openSession(opts);
  const { logger, projectRoot } = session;
  logger.info("Initializing Regolith project...");

  if (opts.force) {
    logger.warn("Initializing the project with --force, existing files may be overwritten.");
  } else {
    await ensureEmpty(projectRoot);
  }

  const file = defaultConfigFile();
  try {
    await fsp.mkdir(projectRoot, { recursive: true });
    await fsp.writeFile(join(projectRoot, ".gitignore"), GITIGNORE, "utf8");
    await saveConfigFile(projectRoot, file);
    for (const folder of [file.packs.behaviorPack, file.packs.resourcePack, file.regolith.dataPath]) {
      await fsp.mkdir(join(projectRoot, folder), { recursive: true });
    }
  } catch (err) {
    throw wrapError(err, "Failed to initialize the project.");
  }
  logger.info(`Regolith project initialized in ${projectRoot}`);
}
