import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { commandHelp, generalHelp, runCli, type CliContext } from '..';
import { commands, findCommand } from '../manifest';

function context(cwd: string) {
  const presenter = { write: vi.fn(), error: vi.fn() };
  const ctx: CliContext = { presenter, cwd, env: {}, signal: new AbortController().signal };
  return { ctx, presenter };
}

describe('regolith CLI', () => {
  let tmpRoot: string;

  beforeEach(async () => {
    tmpRoot = await mkdtemp(join(tmpdir(), 'regolith-cli-'));
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tmpRoot, { recursive: true, force: true });
  });

  it('lists every command in the help', async () => {
    const { ctx, presenter } = context(tmpRoot);

    expect(await runCli(['--help'], ctx)).toBe(0);

    const help = generalHelp();
    expect(presenter.write).toHaveBeenCalledWith(help);
    for (const command of commands) {
      expect(help).toContain(`  ${command.id}`);
    }
  });

  it('shows command help', async () => {
    const { ctx, presenter } = context(tmpRoot);
    const install = findCommand('install');
    if (!install) { throw new Error('install is not in the manifest'); }

    expect(await runCli(['install', '--help'], ctx)).toBe(0);

    expect(presenter.write).toHaveBeenCalledWith(commandHelp(install));
    expect(commandHelp(install).split('\n')[0]).toBe('Usage: regolith install <specifiers...> [options]');
  });

  it('accepts options before the command', async () => {
    const { ctx, presenter } = context(tmpRoot);
    const run = findCommand('run');
    if (!run) { throw new Error('run is not in the manifest'); }

    expect(await runCli(['--help', 'run'], ctx)).toBe(0);
    expect(presenter.write).toHaveBeenCalledWith(commandHelp(run));

    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    expect(await runCli(['init'], ctx)).toBe(0);
    expect(debug).not.toHaveBeenCalled();
    expect(await runCli(['--debug', 'run'], ctx)).toBe(0);
    expect(debug).toHaveBeenCalled();
    expect(presenter.error).not.toHaveBeenCalled();
  });

  it('rejects unknown commands and flags', async () => {
    const { ctx, presenter } = context(tmpRoot);

    expect(await runCli(['deploy'], ctx)).toBe(1);
    expect(await runCli(['run', '--fast'], ctx)).toBe(1);
    expect(presenter.error).toHaveBeenCalledTimes(2);
  });

  it('initializes and runs a project', async () => {
    const { ctx, presenter } = context(tmpRoot);

    expect(await runCli(['init'], ctx)).toBe(0);
    expect(JSON.parse(await readFile(join(tmpRoot, 'config.json'), 'utf8'))).toHaveProperty('name', 'Project name');
    expect(await runCli(['run'], ctx)).toBe(0);
    expect(presenter.error).not.toHaveBeenCalled();
  });

  it('prints the error and exits with 1', async () => {
    const { ctx, presenter } = context(tmpRoot);
    await runCli(['init'], ctx);

    expect(await runCli(['run', 'missing'], ctx)).toBe(1);
    expect(presenter.error).toHaveBeenCalledWith('Profile "missing" does not exist in the configuration.');
  });

  it('passes everything after the filter name to tool', async () => {
    const { ctx, presenter } = context(tmpRoot);
    await runCli(['init'], ctx);

    expect(await runCli(['tool', 'ghost', '--size', '16'], ctx)).toBe(1);
    expect(presenter.error).toHaveBeenCalledWith(
      'Unable to find the filter on the "filterDefinitions" list of the "config.json" file.\nFilter name: ghost'
    );
  });

  it('requires a filter name for update', async () => {
    const { ctx, presenter } = context(tmpRoot);
    expect(await runCli(['update'], ctx)).toBe(1);
    expect(presenter.error).toHaveBeenCalledWith('No filters specified. Usage: regolith update <filters...>');
  });
});
