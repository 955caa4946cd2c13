import type { CommandModule } from './types';
import { install } from '../api';
import { booleanFlag, commandOptions } from './utils';

export const run: CommandModule['run'] = async (ctx, argv, flags) => {
  await install(argv, { ...commandOptions(ctx, flags), force: booleanFlag(flags, 'force') });
  return 0;
};
