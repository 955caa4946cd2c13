import { ConfigError } from "../utils/errors";

export interface InstallRequest {
  /** repository url, e.g. `github.com/owner/filters` */
  url: string;
  /** filter directory in the repository, also the filter's name in the project */
  name: string;
  /** undefined when the request names no version */
  version?: string;
}

/**
 * Parses `<repository-url>/<filter-name>[==<version>]`.
 */
export function parseInstallSpecifier(spec: string): InstallRequest {
  const [location = "", version, ...rest] = spec.trim().split("==");
  if (rest.length > 0) {
    throw new ConfigError(`Invalid filter specifier "${spec}": "==" may appear only once.`);
  }
  if (version !== undefined && version.length === 0) {
    throw new ConfigError(`Invalid filter specifier "${spec}": the version after "==" is empty.`);
  }
  const trimmed = location.replace(/\/+$/, "");
  const slash = trimmed.lastIndexOf("/");
  if (slash <= 0 || slash === trimmed.length - 1) {
    throw new ConfigError(
      `Invalid filter specifier "${spec}". Expected <repository-url>/<filter-name>[==<version>].`
    );
  }
  return { url: trimmed.slice(0, slash), name: trimmed.slice(slash + 1), version };
}

export function parseInstallSpecifiers(specs: readonly string[]): InstallRequest[] {
  if (specs.length === 0) {
    throw new ConfigError("No filters specified.");
  }
  const requests = specs.map(parseInstallSpecifier);
  const seen = new Set<string>();
  for (const request of requests) {
    if (seen.has(request.name)) {
      throw new ConfigError(`Filter "${request.name}" is listed more than once.`);
    }
    seen.add(request.name);
  }
  return requests;
}
