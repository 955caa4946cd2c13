import { spawn } from "node:child_process";
import type { SpawnOptions } from "node:child_process";
import type { Logger } from "./logger";

export type RunCommandOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** inherit streams output to the console, pipe collects it */
  stdio?: "inherit" | "pipe";
  /** run `cmd` through the system shell (needed for shell filters) */
  shell?: boolean;
  /** resolve instead of rejecting on a non-zero exit code */
  allowFail?: boolean;
  /** kill the process after this many ms */
  timeoutMs?: number;
  logger?: Logger;
};

export type CommandResult = { code: number; stdout: string; stderr: string };

export class CommandFailedError extends Error {
  constructor(
    readonly command: string,
    readonly code: number,
    readonly stdout: string,
    readonly stderr: string,
  ) {
    super(`Command failed (${code}): ${command}${stderr ? `\n${stderr}` : ""}`);
    this.name = "CommandFailedError";
  }
}

/**
 * Spawns `cmd` with `args`. Output is streamed by default (stdio=inherit).
 * Rejects on a non-zero exit code unless allowFail is set, and on spawn
 * failures such as a missing executable.
 */
export function runCommand(
  cmd: string,
  args: string[] = [],
  opts: RunCommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd,
    env,
    stdio = "inherit",
    shell = false,
    allowFail = false,
    timeoutMs,
    logger,
  } = opts;
  const printable = [cmd, ...args].join(" ");

  logger?.debug("runCommand start", { cmd: printable, cwd });

  return new Promise((resolve, reject) => {
    const spawnOpts: SpawnOptions = {
      cwd,
      env: { ...process.env, ...env },
      shell,
      stdio,
    };

    const child = spawn(cmd, args, spawnOpts);

    let stdout = "";
    let stderr = "";

    if (stdio === "pipe") {
      child.stdout?.on("data", (c: Buffer) => (stdout += c.toString()));
      child.stderr?.on("data", (c: Buffer) => (stderr += c.toString()));
    }

    let timer: NodeJS.Timeout | undefined;
    if (timeoutMs && timeoutMs > 0) {
      timer = setTimeout(() => {
        logger?.warn("runCommand timeout, killing process", { cmd: printable, cwd, timeoutMs });
        child.kill("SIGKILL");
      }, timeoutMs);
    }

    child.on("error", (err) => {
      if (timer) {clearTimeout(timer);}
      logger?.debug("runCommand error", { cmd: printable, cwd, error: err.message });
      reject(err);
    });

    child.on("close", (code) => {
      if (timer) {clearTimeout(timer);}
      logger?.debug("runCommand done", { cmd: printable, cwd, code, stdoutLen: stdout.length, stderrLen: stderr.length });

      if (code === 0 || allowFail) {
        resolve({ code: code ?? 0, stdout, stderr });
      } else {
        reject(new CommandFailedError(printable, code ?? -1, stdout, stderr));
      }
    });
  });
}
