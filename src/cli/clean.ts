import type { CommandModule } from './types';
import { clean } from '../api';
import { booleanFlag, commandOptions } from './utils';

export const run: CommandModule['run'] = async (ctx, _argv, flags) => {
  const result = await clean({ ...commandOptions(ctx, flags), userCache: booleanFlag(flags, 'user-cache') });
  if (result.removed.length === 0) {
    ctx.presenter.write('Nothing to clean.');
  } else {
    for (const path of result.removed) {
      ctx.presenter.write(`Removed ${path}`);
    }
  }
  return 0;
};
