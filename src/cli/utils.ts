import type { CommandOptions } from '../api';
import type { CliContext, Flags } from './types';

export function commandOptions(ctx: CliContext, flags: Flags): CommandOptions {
  return {
    cwd: ctx.cwd,
    env: ctx.env,
    debug: flags.debug === true,
  };
}

export function booleanFlag(flags: Flags, name: string) {
  return flags[name] === true;
}
