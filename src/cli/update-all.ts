import type { CommandModule } from './types';
import { updateAll } from '../api';
import { commandOptions } from './utils';

export const run: CommandModule['run'] = async (ctx, _argv, flags) => {
  await updateAll(commandOptions(ctx, flags));
  return 0;
};
