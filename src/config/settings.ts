import { z } from 'zod';
import { ConfigError } from '../utils/errors';
import type { LogLevel } from '../utils/logger';
import { formatZodError } from './schema';

const flag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const settingsSchema = z.object({
  REGOLITH_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  REGOLITH_USE_APP_DATA: flag,
  COM_MOJANG: z.string().min(1).optional(),
  REGOLITH_PYTHON: z.string().min(1).optional(),
});

/** Machine-level settings read from the environment. */
export interface Settings {
  logLevel: LogLevel;
  /** keep the cache root in the user cache directory instead of `.regolith` */
  useAppData: boolean;
  comMojangPath?: string;
  pythonCommand: string;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment settings.\n${formatZodError(parsed.error)}`);
  }
  const data = parsed.data;
  return {
    logLevel: data.REGOLITH_LOG_LEVEL,
    useAppData: data.REGOLITH_USE_APP_DATA,
    comMojangPath: data.COM_MOJANG,
    pythonCommand: data.REGOLITH_PYTHON ?? (process.platform === 'win32' ? 'python' : 'python3'),
  };
}
