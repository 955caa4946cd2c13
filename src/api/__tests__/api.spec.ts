import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { clean, init, install, installAll, run, tool, update, updateAll, type CommandOptions } from '..';
import { ConfigError, InstallError, LockError } from '../../utils/errors';
import { SessionLock } from '../../lock/session-lock';
import { loadConfigFile, saveConfigFile } from '../../config/config';
import { readFilterDescriptor } from '../../filters/subfilters';
import { FakeGit, silentLogger, writeFiles } from '../../__tests__/helpers';

const URL = 'example.com/owner/filters';
const descriptor = JSON.stringify({ filters: [{ runWith: 'shell', command: 'echo hi' }] });

async function readJsonFile(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, 'utf8'));
}

describe('project commands', () => {
  let tmpRoot: string;
  let opts: CommandOptions;

  beforeEach(async () => {
    tmpRoot = await mkdtemp(join(tmpdir(), 'regolith-api-'));
    opts = { cwd: tmpRoot, env: {}, logger: silentLogger() };
  });

  afterEach(async () => {
    await rm(tmpRoot, { recursive: true, force: true });
  });

  describe('init', () => {
    it('creates a project that runs right away', async () => {
      await init(opts);

      expect(await readFile(join(tmpRoot, '.gitignore'), 'utf8')).toBe('/build\n/.regolith\n');
      expect(await readJsonFile(join(tmpRoot, 'config.json'))).toEqual({
        $schema: 'https://raw.githubusercontent.com/Bedrock-OSS/regolith-schemas/main/config/v1.json',
        name: 'Project name',
        author: 'Your name',
        packs: { behaviorPack: './packs/BP', resourcePack: './packs/RP' },
        regolith: {
          dataPath: './packs/data',
          filterDefinitions: {},
          profiles: { default: { filters: [], export: { target: 'local', readOnly: false } } },
        },
      });

      await run('default', opts);

      expect(await readdir(join(tmpRoot, 'build', 'Project name_rp'))).toEqual([]);
      expect(await readdir(join(tmpRoot, 'build', 'Project name_bp'))).toEqual([]);
      await expect(stat(join(tmpRoot, '.regolith', 'session_lock'))).rejects.toThrow();
    });

    it('refuses a non-empty directory without force', async () => {
      await writeFiles(tmpRoot, { 'notes.txt': 'keep' });

      await expect(init(opts)).rejects.toBeInstanceOf(ConfigError);
      await expect(stat(join(tmpRoot, 'config.json'))).rejects.toThrow();

      await init({ ...opts, force: true });
      expect(await readFile(join(tmpRoot, 'notes.txt'), 'utf8')).toBe('keep');
      expect((await stat(join(tmpRoot, 'packs', 'data'))).isDirectory()).toBe(true);
    });
  });

  describe('run', () => {
    it('rejects unknown profiles', async () => {
      await init(opts);
      await expect(run('missing', opts)).rejects.toThrow('Profile "missing" does not exist in the configuration.');
    });

    it('fails fast while another session holds the lock', async () => {
      await init(opts);
      const lock = new SessionLock(join(tmpRoot, '.regolith'));
      await lock.acquire();
      try {
        const err: unknown = await run('default', opts).catch((e: unknown) => e);
        expect(err).toBeInstanceOf(LockError);
        expect(err).toHaveProperty('reason', 'locked');
      } finally {
        await lock.release();
      }
    });
  });

  describe.skipIf(process.platform === 'win32')('tool', () => {
    it('overwrites the source folders with the output of one filter', async () => {
      await init(opts);
      const file = await loadConfigFile(tmpRoot);
      file.regolith.filterDefinitions.note = { runWith: 'shell', command: 'echo > RP/note.txt' };
      await saveConfigFile(tmpRoot, file);
      await writeFiles(tmpRoot, { 'packs/RP/manifest.json': '{}' });

      await tool('note', ['from', 'tool'], opts);

      expect((await readdir(join(tmpRoot, 'packs', 'RP'))).sort()).toEqual(['manifest.json', 'note.txt']);
      expect(await readFile(join(tmpRoot, 'packs', 'RP', 'note.txt'), 'utf8')).toBe('from tool\n');
    });

    it('rejects filters that are not defined', async () => {
      await init(opts);
      await expect(tool('ghost', [], opts)).rejects.toThrow(
        'Unable to find the filter on the "filterDefinitions" list of the "config.json" file.\nFilter name: ghost'
      );
    });
  });

  describe('clean', () => {
    it('removes the project cache', async () => {
      await mkdir(join(tmpRoot, '.regolith', 'cache'), { recursive: true });

      const result = await clean(opts);

      expect(result.removed).toEqual([join(tmpRoot, '.regolith')]);
      await expect(stat(join(tmpRoot, '.regolith'))).rejects.toThrow();
    });

    it.skipIf(process.platform !== 'linux')('empties the user cache', async () => {
      const cacheHome = join(tmpRoot, 'cache');
      await writeFiles(cacheHome, { 'regolith/project-cache/abc/session_lock': '{}' });

      const result = await clean({ ...opts, env: { XDG_CACHE_HOME: cacheHome }, userCache: true });

      expect(result.removed).toEqual([join(cacheHome, 'regolith')]);
      expect(await readdir(join(cacheHome, 'regolith'))).toEqual([]);
    });
  });
});

describe('remote filter commands', () => {
  let tmpRoot: string;
  let git: FakeGit;
  let opts: CommandOptions;

  const configPath = () => join(tmpRoot, 'config.json');
  const cachedVersion = async (name: string) =>
    (await readFilterDescriptor(join(tmpRoot, '.regolith', 'cache', 'filters', name))).version;
  const definitions = async () => (await loadConfigFile(tmpRoot)).regolith.filterDefinitions;

  beforeEach(async () => {
    tmpRoot = await mkdtemp(join(tmpdir(), 'regolith-remote-'));
    git = new FakeGit({
      [URL]: {
        head: 'c0ffee1',
        tags: { 'hello-1.0.0': 'a11ce01', 'hello-1.2.0': 'b0b0b01' },
        commits: {
          a11ce01: { 'hello/filter.json': descriptor },
          b0b0b01: { 'hello/filter.json': descriptor, 'hello/data/seed.txt': 'seed' },
          c0ffee1: { 'hello/filter.json': descriptor, 'tracker/filter.json': descriptor },
          d00d001: { 'hello/filter.json': descriptor },
        },
      },
    });
    opts = { cwd: tmpRoot, env: {}, logger: silentLogger(), git };
    await init(opts);
  });

  afterEach(async () => {
    await rm(tmpRoot, { recursive: true, force: true });
  });

  it('installs the highest version and records it', async () => {
    await install([`${URL}/hello`], opts);

    expect(await definitions()).toEqual({ hello: { url: URL, version: '1.2.0' } });
    expect(await cachedVersion('hello')).toBe('1.2.0');
    expect(await readFile(join(tmpRoot, 'packs', 'data', 'hello', 'seed.txt'), 'utf8')).toBe('seed');
  });

  it('refuses to reinstall without force and leaves config.json alone', async () => {
    await install([`${URL}/hello==1.0.0`], opts);
    const before = await readFile(configPath(), 'utf8');

    const err: unknown = await install([`${URL}/hello`], opts).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InstallError);
    expect(err).toHaveProperty(
      'message',
      'The filter is already on the filter definitions list.\nFilter: hello\n' +
        'If you want to force the installation of the filter, add the "--force" flag to "regolith install".'
    );
    expect(await readFile(configPath(), 'utf8')).toBe(before);
    expect(git.checkouts).toHaveLength(1);

    await install([`${URL}/hello==1.2.0`], { ...opts, force: true });
    expect(await definitions()).toEqual({ hello: { url: URL, version: '1.2.0' } });
    expect(await cachedVersion('hello')).toBe('1.2.0');
  });

  it('keeps HEAD literal in the config', async () => {
    await install([`${URL}/tracker==HEAD`], opts);

    expect(await definitions()).toEqual({ tracker: { url: URL, version: 'HEAD' } });
    expect(await cachedVersion('tracker')).toBe('c0ffee1');
  });

  it('installs missing filters of the config', async () => {
    await install([`${URL}/hello==1.0.0`, `${URL}/tracker==HEAD`], opts);
    await rm(join(tmpRoot, '.regolith'), { recursive: true, force: true });

    await installAll(opts);

    expect(await cachedVersion('hello')).toBe('1.0.0');
    expect(await cachedVersion('tracker')).toBe('c0ffee1');
    expect(git.checkouts).toHaveLength(4);
  });

  it('updates tracking filters and leaves pinned ones', async () => {
    await install([`${URL}/hello==1.0.0`, `${URL}/tracker==HEAD`], opts);
    const repo = git.repos[URL];
    if (!repo) { throw new Error('missing fake repository'); }
    repo.head = 'd00d001';
    repo.commits.d00d001 = { 'tracker/filter.json': descriptor };

    await updateAll(opts);

    expect(await cachedVersion('tracker')).toBe('d00d001');
    expect(await cachedVersion('hello')).toBe('1.0.0');
    expect(await definitions()).toEqual({
      hello: { url: URL, version: '1.0.0' },
      tracker: { url: URL, version: 'HEAD' },
    });
  });

  it('skips unknown names on update', async () => {
    await install([`${URL}/hello==1.0.0`], opts);

    await update(['ghost', 'hello'], opts);

    expect(opts.logger?.warn).toHaveBeenCalledWith('Filter "ghost" is not on the "filterDefinitions" list, skipping.');
    expect(await cachedVersion('hello')).toBe('1.0.0');
    expect(git.checkouts).toHaveLength(1);
  });

  it('runs installed filters as part of a profile', async () => {
    await install([`${URL}/hello==1.0.0`], opts);
    const file = await loadConfigFile(tmpRoot);
    file.regolith.profiles.default = { filters: [{ filter: 'hello' }], export: { target: 'local', readOnly: false } };
    await saveConfigFile(tmpRoot, file);

    await run('default', opts);

    expect(await readdir(join(tmpRoot, 'build', 'Project name_rp'))).toEqual([]);
  });
});
