import * as semver from "semver";
import { InstallError } from "../utils/errors";
import type { GitClient, GitRef } from "../utils/git";
import { HEAD, LATEST } from "../filters/remote-filter";

export interface ResolvedVersion {
  /** value written to `filterDefinitions`; `HEAD` and `latest` stay literal */
  version: string;
  /** concrete version that gets installed: a semver or a commit hash */
  installedVersion: string;
  ref: GitRef;
}

const COMMIT_HASH = /^[0-9a-f]{7,40}$/i;

/** Filters of a repository are tagged `<filter-name>-<semver>`. */
export function versionTag(name: string, version: string) {
  return `${name}-${version}`;
}

/**
 * Highest semver among the tags of `name`, or null when it has none.
 */
export function latestVersion(name: string, tags: readonly string[]): string | null {
  const prefix = `${name}-`;
  const versions = tags
    .filter((tag) => tag.startsWith(prefix))
    .map((tag) => tag.slice(prefix.length))
    .filter((version) => semver.valid(version) !== null);
  if (versions.length === 0) { return null; }
  return semver.rsort(versions)[0] ?? null;
}

async function headVersion(git: GitClient, url: string): Promise<{ installedVersion: string; ref: GitRef }> {
  const sha = await git.headCommit(url);
  return { installedVersion: sha, ref: { type: "commit", sha } };
}

/**
 * Resolves a version specifier against the remote repository: a semver,
 * a commit hash, `HEAD`, `latest`, or nothing (highest tag, else `HEAD`).
 */
export async function resolveVersion(
  git: GitClient,
  url: string,
  name: string,
  version?: string
): Promise<ResolvedVersion> {
  try {
    if (version === HEAD) {
      return { version: HEAD, ...(await headVersion(git, url)) };
    }
    if (version === undefined || version === LATEST) {
      const latest = latestVersion(name, await git.listTags(url));
      if (latest === null) {
        return { version: version ?? HEAD, ...(await headVersion(git, url)) };
      }
      return {
        version: version ?? latest,
        installedVersion: latest,
        ref: { type: "tag", name: versionTag(name, latest) },
      };
    }
    if (semver.valid(version) !== null) {
      const tag = versionTag(name, version);
      const tags = await git.listTags(url);
      if (!tags.includes(tag)) {
        throw new InstallError(`Version ${version} of filter "${name}" does not exist (no tag "${tag}" in ${url}).`);
      }
      return { version, installedVersion: version, ref: { type: "tag", name: tag } };
    }
    if (COMMIT_HASH.test(version)) {
      return { version, installedVersion: version, ref: { type: "commit", sha: version } };
    }
  } catch (err) {
    if (err instanceof InstallError) { throw err; }
    throw new InstallError(`Unable to resolve the version of filter "${name}" from ${url}.`, { cause: err });
  }
  throw new InstallError(
    `Invalid version "${version}" of filter "${name}". Use a semantic version, a commit hash, "${HEAD}" or "${LATEST}".`
  );
}
