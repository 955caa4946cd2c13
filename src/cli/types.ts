export interface Presenter {
  write(line: string): void;
  error(line: string): void;
}

export interface CliContext {
  presenter: Presenter;
  /** project root; defaults to the working directory */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** aborted on SIGINT / SIGTERM; stops `watch` */
  signal: AbortSignal;
}

export type FlagValue = string | boolean | undefined;
export type Flags = Record<string, FlagValue>;

export type CommandModule = {
  run: (ctx: CliContext, argv: string[], flags: Flags) => Promise<number | void>;
};

export function consolePresenter(): Presenter {
  return {
    write: (line) => process.stdout.write(`${line}\n`),
    error: (line) => process.stderr.write(`${line}\n`),
  };
}
