import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { vi } from 'vitest';
import type { Logger } from '../utils/logger';
import type { GitClient, GitRef } from '../utils/git';
import type { Config, Profile } from '../config/types';
import type { RunContext } from '../filters/types';

export function silentLogger(): Logger {
  return {
    level: 'debug',
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export async function writeFiles(root: string, files: Record<string, string>) {
  for (const [rel, content] of Object.entries(files)) {
    const p = join(root, rel);
    await mkdir(dirname(p), { recursive: true });
    await writeFile(p, content, 'utf8');
  }
}

export interface FakeRepo {
  /** commit the remote HEAD points at */
  head: string;
  /** tag name -> commit */
  tags: Record<string, string>;
  /** commit -> files of the repository at that commit */
  commits: Record<string, Record<string, string>>;
}

/**
 * In-process stand-in for git: repositories are plain objects and a
 * checkout writes the files of a commit into the destination.
 */
export class FakeGit implements GitClient {
  readonly checkouts: Array<{ url: string; ref: GitRef }> = [];

  constructor(readonly repos: Record<string, FakeRepo>, private readonly available = true) {}

  private repo(url: string) {
    const repo = this.repos[url];
    if (!repo) { throw new Error(`repository not found: ${url}`); }
    return repo;
  }

  async isAvailable() {
    return this.available;
  }

  async listTags(url: string) {
    return Object.keys(this.repo(url).tags);
  }

  async headCommit(url: string) {
    return this.repo(url).head;
  }

  async checkout(url: string, ref: GitRef, dest: string) {
    const repo = this.repo(url);
    const sha = ref.type === 'tag' ? repo.tags[ref.name] : ref.sha;
    const files = sha === undefined ? undefined : repo.commits[sha];
    if (!files) { throw new Error(`unknown ref in ${url}`); }
    this.checkouts.push({ url, ref });
    await writeFiles(dest, files);
  }
}

export function makeConfig(overrides: Partial<Config> = {}): Config {
  return {
    name: 'demo',
    author: 'tester',
    packs: { resourceFolder: 'RP', behaviorFolder: 'BP' },
    dataPath: 'data',
    filterDefinitions: new Map(),
    profiles: new Map<string, Profile>(),
    ...overrides,
  };
}

export function makeContext(root: string, config: Config, profile = 'default', logger = silentLogger()): RunContext {
  return {
    config,
    profile,
    absoluteLocation: root,
    dotRegolithPath: join(root, '.regolith'),
    settings: { logLevel: 'debug', useAppData: false, pythonCommand: 'python3' },
    logger,
  };
}
