import { runCommand } from "./runCommand";
import type { Logger } from "./logger";

/**
 * The git operations remote filter installation needs. The pipeline talks to
 * this interface so tests can hand in an in-process fake.
 */
export interface GitClient {
  /** true when a `git` executable answers on this machine */
  isAvailable(): Promise<boolean>;
  /** tag names of the remote repository (without the `refs/tags/` prefix) */
  listTags(repoUrl: string): Promise<string[]>;
  /** commit hash the remote HEAD points at */
  headCommit(repoUrl: string): Promise<string>;
  /** checks the repository out at `ref` (a tag or a commit hash) into `dest` */
  checkout(repoUrl: string, ref: GitRef, dest: string): Promise<void>;
}

export type GitRef = { type: "tag"; name: string } | { type: "commit"; sha: string };

export function toCloneUrl(repoUrl: string) {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(repoUrl) ? repoUrl : `https://${repoUrl}`;
}

/**
 * Parses `git ls-remote` output (`<sha>\t<ref>` per line).
 */
export function parseLsRemote(stdout: string): Array<{ sha: string; ref: string }> {
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => {
      const [sha = "", ref = ""] = line.split(/\s+/);
      return { sha, ref };
    })
    .filter((entry) => entry.sha.length > 0 && entry.ref.length > 0);
}

const TAG_PREFIX = "refs/tags/";

/** Tag names listed by `git ls-remote --tags`, without peeled duplicates. */
export function tagsFromLsRemote(stdout: string): string[] {
  return parseLsRemote(stdout)
    .map(({ ref }) => ref)
    // annotated tags show up twice, once peeled with a ^{} suffix
    .filter((ref) => ref.startsWith(TAG_PREFIX) && !ref.endsWith("^{}"))
    .map((ref) => ref.slice(TAG_PREFIX.length));
}

export function createGitClient(logger?: Logger): GitClient {
  return {
    async isAvailable() {
      try {
        const { code } = await runCommand("git", ["--version"], { stdio: "pipe", allowFail: true, logger });
        return code === 0;
      } catch (error) {
        logger?.debug("git is not available", { error: error instanceof Error ? error.message : String(error) });
        return false;
      }
    },

    async listTags(repoUrl) {
      const { stdout } = await runCommand("git", ["ls-remote", "--tags", toCloneUrl(repoUrl)], {
        stdio: "pipe",
        logger,
      });
      return tagsFromLsRemote(stdout);
    },

    async headCommit(repoUrl) {
      const { stdout } = await runCommand("git", ["ls-remote", toCloneUrl(repoUrl), "HEAD"], {
        stdio: "pipe",
        logger,
      });
      const head = parseLsRemote(stdout).find(({ ref }) => ref === "HEAD");
      if (!head) {
        throw new Error(`Remote repository ${repoUrl} has no HEAD`);
      }
      return head.sha;
    },

    async checkout(repoUrl, ref, dest) {
      const url = toCloneUrl(repoUrl);
      if (ref.type === "tag") {
        await runCommand("git", ["clone", "--quiet", "--depth", "1", "--branch", ref.name, url, dest], {
          stdio: "pipe",
          logger,
        });
        return;
      }
      await runCommand("git", ["clone", "--quiet", url, dest], { stdio: "pipe", logger });
      await runCommand("git", ["-C", dest, "checkout", "--quiet", ref.sha], { stdio: "pipe", logger });
    },
  };
}
