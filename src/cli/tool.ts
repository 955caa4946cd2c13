import type { CommandModule } from './types';
import { tool } from '../api';
import { commandOptions } from './utils';

export const run: CommandModule['run'] = async (ctx, argv, flags) => {
  const [filter, ...args] = argv;
  if (filter === undefined) {
    ctx.presenter.error('Missing the name of the filter. Usage: regolith tool <filter> [args...]');
    return 1;
  }
  await tool(filter, args, commandOptions(ctx, flags));
  return 0;
};
