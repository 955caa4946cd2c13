export * from './api';
export { runCli } from './cli';

export {
  RegolithError,
  ConfigError,
  FilterCheckError,
  FilterRunError,
  InstallError,
  LockError,
  StageError,
  ExportError,
  formatErrorChain,
} from './utils/errors';
export { createLogger, type Logger, type LogLevel } from './utils/logger';
export type { GitClient, GitRef } from './utils/git';
export type { Config, ExportTarget, Profile } from './config/types';
export type { FilterInstaller, FilterRunner, RunContext } from './filters/types';
export type { ChangeSource } from './watch/watch';
