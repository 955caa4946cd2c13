import { join } from 'path';
import { ConfigError, errnoCode } from '../utils/errors';
import { readJson, writeJson } from '../utils/fs';
import { filterInstallerFromObject, filterRunnerFromObject } from '../filters/factory';
import { nth } from '../filters/collection';
import type { FilterInstaller, FilterRunner } from '../filters/types';
import {
  CONFIG_SCHEMA_URL,
  configFileSchema,
  exportTargetSchema,
  formatZodError,
  profileSchema,
  type ConfigFile,
} from './schema';
import type { Config, ExportTarget, Profile } from './types';

export const CONFIG_FILE = 'config.json';

export function configPath(projectRoot: string) {
  return join(projectRoot, CONFIG_FILE);
}

/**
 * Reads and validates `config.json`. Unknown properties are kept, so the
 * result can be written back after an edit without losing anything.
 */
export async function loadConfigFile(projectRoot: string): Promise<ConfigFile> {
  const path = configPath(projectRoot);
  let raw: unknown;
  try {
    raw = await readJson(path);
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new ConfigError(`"${CONFIG_FILE}" not found in ${projectRoot}. Run "regolith init" to create a project.`, { cause: err });
    }
    throw new ConfigError(`Could not load "${CONFIG_FILE}".`, { cause: err });
  }
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid "${CONFIG_FILE}".\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

export async function saveConfigFile(projectRoot: string, file: ConfigFile) {
  await writeJson(configPath(projectRoot), file);
}

export function exportTargetFromObject(obj: unknown): ExportTarget {
  const parsed = exportTargetSchema.safeParse(obj);
  if (!parsed.success) {
    throw new ConfigError(`Could not parse "export".\n${formatZodError(parsed.error)}`);
  }
  const { target, readOnly, rpPath, bpPath } = parsed.data;
  return { target, readOnly, rpPath, bpPath };
}

export function profileFromObject(obj: unknown, definitions: ReadonlyMap<string, FilterInstaller>): Profile {
  const parsed = profileSchema.safeParse(obj);
  if (!parsed.success) {
    throw new ConfigError(`Invalid profile.\n${formatZodError(parsed.error)}`);
  }
  const filters: FilterRunner[] = parsed.data.filters.map((entry, index) => {
    try {
      return filterRunnerFromObject(entry, definitions);
    } catch (err) {
      throw new ConfigError(`Could not parse the ${nth(index)} filter of the profile.`, { cause: err });
    }
  });
  return { filters, exportTarget: exportTargetFromObject(parsed.data.export) };
}

export function configFromObject(file: ConfigFile): Config {
  const filterDefinitions = new Map<string, FilterInstaller>();
  for (const [name, definition] of Object.entries(file.regolith.filterDefinitions)) {
    filterDefinitions.set(name, filterInstallerFromObject(name, definition));
  }
  const profiles = new Map<string, Profile>();
  for (const [name, profile] of Object.entries(file.regolith.profiles)) {
    try {
      profiles.set(name, profileFromObject(profile, filterDefinitions));
    } catch (err) {
      throw new ConfigError(`Could not parse profile "${name}".`, { cause: err });
    }
  }
  return {
    name: file.name,
    author: file.author,
    packs: {
      resourceFolder: file.packs.resourcePack,
      behaviorFolder: file.packs.behaviorPack,
    },
    dataPath: file.regolith.dataPath,
    filterDefinitions,
    profiles,
  };
}

function exportTargetToObject(target: ExportTarget) {
  const obj: Record<string, unknown> = { target: target.target, readOnly: target.readOnly };
  if (target.rpPath !== undefined) { obj.rpPath = target.rpPath; }
  if (target.bpPath !== undefined) { obj.bpPath = target.bpPath; }
  return obj;
}

export function configToObject(config: Config): ConfigFile {
  return {
    $schema: CONFIG_SCHEMA_URL,
    name: config.name,
    author: config.author,
    packs: {
      behaviorPack: config.packs.behaviorFolder,
      resourcePack: config.packs.resourceFolder,
    },
    regolith: {
      dataPath: config.dataPath,
      filterDefinitions: Object.fromEntries(
        [...config.filterDefinitions].map(([name, installer]) => [name, installer.toObject()])
      ),
      profiles: Object.fromEntries(
        [...config.profiles].map(([name, profile]) => [
          name,
          {
            filters: profile.filters.map((filter) => filter.toObject()),
            export: exportTargetToObject(profile.exportTarget),
          },
        ])
      ),
    },
  };
}

export async function loadConfig(projectRoot: string): Promise<Config> {
  return configFromObject(await loadConfigFile(projectRoot));
}
