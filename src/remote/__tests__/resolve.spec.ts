import { describe, it, expect } from 'vitest';
import { latestVersion, resolveVersion } from '../resolve';
import { parseInstallSpecifier, parseInstallSpecifiers } from '../specifier';
import { ConfigError, InstallError } from '../../utils/errors';
import { FakeGit } from '../../__tests__/helpers';

const URL = 'example.com/owner/filters';

function git(tags: Record<string, string> = {}) {
  return new FakeGit({ [URL]: { head: 'f00dcafe', tags, commits: {} } });
}

describe('install specifiers', () => {
  it('splits the repository url, the filter name and the version', () => {
    expect(parseInstallSpecifier('github.com/owner/filters/name_ninja')).toEqual({
      url: 'github.com/owner/filters',
      name: 'name_ninja',
      version: undefined,
    });
    expect(parseInstallSpecifier('github.com/owner/filters/name_ninja==1.2.3')).toEqual({
      url: 'github.com/owner/filters',
      name: 'name_ninja',
      version: '1.2.3',
    });
  });

  it('rejects specifiers without a repository', () => {
    expect(() => parseInstallSpecifier('name_ninja')).toThrow(ConfigError);
    expect(() => parseInstallSpecifier('github.com/owner/filters/name_ninja==')).toThrow(
      'the version after "==" is empty'
    );
  });

  it('rejects empty and duplicate requests', () => {
    expect(() => parseInstallSpecifiers([])).toThrow('No filters specified.');
    expect(() => parseInstallSpecifiers(['a.com/x/f', 'b.com/y/f==HEAD'])).toThrow('Filter "f" is listed more than once.');
  });
});

describe('latestVersion', () => {
  it('picks the highest semver tag of the filter', () => {
    const tags = ['hello-1.0.0', 'hello-1.10.0', 'hello-1.2.0', 'other-9.0.0', 'hello-beta', 'hello-world-3.0.0'];
    expect(latestVersion('hello', tags)).toBe('1.10.0');
  });

  it('returns null without version tags', () => {
    expect(latestVersion('hello', ['other-1.0.0', 'v1.0.0'])).toBeNull();
  });
});

describe('resolveVersion', () => {
  it('resolves an omitted version to the highest tag', async () => {
    const resolved = await resolveVersion(git({ 'hello-1.0.0': 'a1', 'hello-2.0.0': 'b2' }), URL, 'hello');
    expect(resolved).toEqual({ version: '2.0.0', installedVersion: '2.0.0', ref: { type: 'tag', name: 'hello-2.0.0' } });
  });

  it('falls back to HEAD without version tags', async () => {
    expect(await resolveVersion(git(), URL, 'hello')).toEqual({
      version: 'HEAD',
      installedVersion: 'f00dcafe',
      ref: { type: 'commit', sha: 'f00dcafe' },
    });
    expect(await resolveVersion(git(), URL, 'hello', 'latest')).toEqual({
      version: 'latest',
      installedVersion: 'f00dcafe',
      ref: { type: 'commit', sha: 'f00dcafe' },
    });
  });

  it('keeps latest literal while installing the highest tag', async () => {
    const resolved = await resolveVersion(git({ 'hello-1.4.0': 'a1' }), URL, 'hello', 'latest');
    expect(resolved.version).toBe('latest');
    expect(resolved.installedVersion).toBe('1.4.0');
  });

  it('pins HEAD to the current commit but persists HEAD', async () => {
    const resolved = await resolveVersion(git({ 'hello-1.4.0': 'a1' }), URL, 'hello', 'HEAD');
    expect(resolved).toEqual({ version: 'HEAD', installedVersion: 'f00dcafe', ref: { type: 'commit', sha: 'f00dcafe' } });
  });

  it('takes commit hashes verbatim', async () => {
    const resolved = await resolveVersion(git(), URL, 'hello', 'abc1234');
    expect(resolved).toEqual({ version: 'abc1234', installedVersion: 'abc1234', ref: { type: 'commit', sha: 'abc1234' } });
  });

  it('requires the tag of an explicit version', async () => {
    await expect(resolveVersion(git({ 'hello-1.0.0': 'a1' }), URL, 'hello', '1.1.0')).rejects.toThrow(
      `Version 1.1.0 of filter "hello" does not exist (no tag "hello-1.1.0" in ${URL}).`
    );
  });

  it('rejects anything else', async () => {
    await expect(resolveVersion(git(), URL, 'hello', 'newest')).rejects.toBeInstanceOf(InstallError);
  });

  it('wraps remote failures', async () => {
    const err: unknown = await resolveVersion(git(), 'example.com/missing/repo', 'hello').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InstallError);
    expect(err).toHaveProperty('message', 'Unable to resolve the version of filter "hello" from example.com/missing/repo.');
  });
});
