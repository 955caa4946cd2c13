import { describe, it, expect, vi } from 'vitest';
import { checkFilterCollection, nth, runFilterCollection } from '../collection';
import { ProfileFilterRunner } from '../profile-filter';
import type { FilterRunner, RunContext } from '../types';
import type { Profile } from '../../config/types';
import { FilterCheckError, FilterRunError, formatErrorChain } from '../../utils/errors';
import { makeConfig, makeContext } from '../../__tests__/helpers';

class StubRunner implements FilterRunner {
  readonly kind = 'local';
  readonly arguments: string[] = [];
  readonly settings: Record<string, unknown> = {};
  readonly check = vi.fn(async (_ctx: RunContext) => {});
  readonly run = vi.fn(async (_ctx: RunContext) => this.modifies);

  constructor(readonly id: string, readonly disabled = false, private readonly modifies = true) {}

  isDisabled() { return this.disabled; }
  getId() { return this.id; }
  copyArguments() {}
  toObject() { return { filter: this.id }; }
}

function profile(filters: FilterRunner[]): Profile {
  return { filters, exportTarget: { target: 'local', readOnly: false } };
}

describe('nth', () => {
  it('formats ordinals', () => {
    expect([0, 1, 2, 3, 10, 11, 12, 20, 21, 101, 110].map(nth)).toEqual([
      '1st', '2nd', '3rd', '4th', '11th', '12th', '13th', '21st', '22nd', '102nd', '111th',
    ]);
  });
});

describe('filter collections', () => {
  const ctx = makeContext('/project', makeConfig());

  it('checks disabled filters and fails on them', async () => {
    const first = new StubRunner('first');
    const broken = new StubRunner('broken', true);
    broken.check.mockRejectedValueOnce(new Error('missing tool'));

    const err: unknown = await checkFilterCollection(profile([first, broken]), ctx).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FilterCheckError);
    expect(formatErrorChain(err)).toBe(
      'Filter check failed.\nFilter: broken (2nd filter)\nProfile: default\n[+] missing tool'
    );
    expect(first.check).toHaveBeenCalledTimes(1);
  });

  it('skips disabled filters when running', async () => {
    const first = new StubRunner('first', false, false);
    const skipped = new StubRunner('skipped', true);
    const last = new StubRunner('last', false, false);

    const modified = await runFilterCollection(profile([first, skipped, last]), ctx);

    expect(modified).toBe(false);
    expect(first.run).toHaveBeenCalledTimes(1);
    expect(skipped.run).not.toHaveBeenCalled();
    expect(last.run).toHaveBeenCalledTimes(1);
    expect(ctx.logger.info).toHaveBeenCalledWith('Filter "skipped" is disabled, skipping.');
  });

  it('stops at the first failing filter', async () => {
    const failing = new StubRunner('failing');
    failing.run.mockRejectedValueOnce(new Error('exit code 2'));
    const after = new StubRunner('after');

    const err: unknown = await runFilterCollection(profile([failing, after]), ctx).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FilterRunError);
    expect(formatErrorChain(err)).toBe(
      'Failed to run filter.\nFilter: failing (1st filter)\nProfile: default\n[+] exit code 2'
    );
    expect(after.run).not.toHaveBeenCalled();
  });

  it('reports whether any filter modified the workspace', async () => {
    const modified = await runFilterCollection(
      profile([new StubRunner('a', false, false), new StubRunner('b', false, true)]),
      ctx
    );
    expect(modified).toBe(true);
  });
});

describe('nested profiles', () => {
  it('runs the filters of the referenced profile', async () => {
    const inner = new StubRunner('inner');
    const config = makeConfig({
      profiles: new Map([
        ['default', profile([new ProfileFilterRunner('shared')])],
        ['shared', profile([inner])],
      ]),
    });
    const ctx = makeContext('/project', config);

    await checkFilterCollection(config.profiles.get('default') ?? profile([]), ctx);
    await runFilterCollection(config.profiles.get('default') ?? profile([]), ctx);

    expect(inner.check).toHaveBeenCalledTimes(1);
    expect(inner.run).toHaveBeenCalledTimes(1);
    const innerCtx = inner.run.mock.calls[0]?.[0];
    expect(innerCtx?.profile).toBe('shared');
    expect(innerCtx?.parent?.profile).toBe('default');
  });

  it('fails the check of a profile cycle', async () => {
    const config = makeConfig({
      profiles: new Map([
        ['a', profile([new ProfileFilterRunner('b')])],
        ['b', profile([new ProfileFilterRunner('a')])],
      ]),
    });
    const ctx = makeContext('/project', config, 'a');

    const err: unknown = await checkFilterCollection(config.profiles.get('a') ?? profile([]), ctx).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(FilterCheckError);
    expect(formatErrorChain(err).split('\n').pop()).toBe('[+] Profile "a" references itself: a -> b -> a');
  });

  it('fails the check of a missing profile', async () => {
    const config = makeConfig({ profiles: new Map([['default', profile([new ProfileFilterRunner('ghost')])]]) });
    const ctx = makeContext('/project', config);

    await expect(checkFilterCollection(config.profiles.get('default') ?? profile([]), ctx)).rejects.toThrow(
      'Filter check failed.\nFilter: 1st filter\nProfile: default'
    );
  });
});
