import { ConfigError } from "../utils/errors";
import { formatZodError, isRemoteDefinition, profileReferenceSchema } from "../config/schema";
import { localFilterInstallerFromObject } from "./local-filter";
import { ProfileFilterRunner } from "./profile-filter";
import { remoteFilterInstallerFromObject } from "./remote-filter";
import type { FilterInstaller, FilterRunner } from "./types";

/**
 * Builds the installer of a `filterDefinitions` entry. New filter kinds are
 * added here.
 */
export function filterInstallerFromObject(name: string, obj: unknown): FilterInstaller {
  if (typeof obj !== "object" || obj === null || Array.isArray(obj)) {
    throw new ConfigError(`The definition of filter "${name}" is not an object.`);
  }
  if (isRemoteDefinition(obj)) {
    return remoteFilterInstallerFromObject(name, obj);
  }
  return localFilterInstallerFromObject(name, obj);
}

/**
 * Builds the runner of a profile entry: either a nested profile reference or
 * a use of one of the `definitions`.
 */
export function filterRunnerFromObject(obj: unknown, definitions: ReadonlyMap<string, FilterInstaller>): FilterRunner {
  if (typeof obj !== "object" || obj === null || Array.isArray(obj)) {
    throw new ConfigError("The filter entry is not an object.");
  }
  if ("profile" in obj) {
    const parsed = profileReferenceSchema.safeParse(obj);
    if (!parsed.success) {
      throw new ConfigError(`Invalid profile reference.\n${formatZodError(parsed.error)}`);
    }
    return new ProfileFilterRunner(parsed.data.profile);
  }
  const name = "filter" in obj ? obj.filter : undefined;
  if (typeof name !== "string" || name.length === 0) {
    throw new ConfigError('The filter entry has neither a "filter" nor a "profile" property.');
  }
  const installer = definitions.get(name);
  if (!installer) {
    throw new ConfigError(`Filter "${name}" is not defined in "filterDefinitions".`);
  }
  return installer.createFilterRunner(obj);
}
