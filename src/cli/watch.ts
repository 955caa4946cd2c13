import type { CommandModule } from './types';
import { watch, DEFAULT_PROFILE } from '../api';
import { commandOptions } from './utils';

export const run: CommandModule['run'] = async (ctx, argv, flags) => {
  const [profile = DEFAULT_PROFILE] = argv;
  await watch(profile, { ...commandOptions(ctx, flags), signal: ctx.signal });
  ctx.presenter.write('Stopped watching.');
  return 0;
};
