import type { CommandModule } from './types';
import { init } from '../api';
import { booleanFlag, commandOptions } from './utils';

export const run: CommandModule['run'] = async (ctx, _argv, flags) => {
  await init({ ...commandOptions(ctx, flags), force: booleanFlag(flags, 'force') });
  return 0;
};
