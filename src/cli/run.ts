import type { CommandModule } from './types';
import { run as runProfile, DEFAULT_PROFILE } from '../api';
import { commandOptions } from './utils';

export const run: CommandModule['run'] = async (ctx, argv, flags) => {
  const [profile = DEFAULT_PROFILE] = argv;
  await runProfile(profile, commandOptions(ctx, flags));
  return 0;
};
