import type { CommandModule } from './types';
import { update } from '../api';
import { commandOptions } from './utils';

export const run: CommandModule['run'] = async (ctx, argv, flags) => {
  if (argv.length === 0) {
    ctx.presenter.error('No filters specified. Usage: regolith update <filters...>');
    return 1;
  }
  await update(argv, commandOptions(ctx, flags));
  return 0;
};
