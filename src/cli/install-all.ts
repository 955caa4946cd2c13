import type { CommandModule } from './types';
import { installAll } from '../api';
import { booleanFlag, commandOptions } from './utils';

export const run: CommandModule['run'] = async (ctx, _argv, flags) => {
  await installAll({ ...commandOptions(ctx, flags), force: booleanFlag(flags, 'force') });
  return 0;
};
