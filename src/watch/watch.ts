import { resolve } from "node:path";
import chokidar from "chokidar";
import { errorMessage, formatErrorChain } from "../utils/errors";
import type { Logger } from "../utils/logger";
import type { RunContext } from "../filters/types";

/** Something that reports changed paths until it is closed. */
export interface ChangeSource {
  onChange(listener: (path: string) => void): void;
  close(): Promise<void>;
}

export interface SourceWatcher extends ChangeSource {
  /** resolves once the initial scan is done and changes are reported */
  ready(): Promise<void>;
}

/**
 * Watches the project's source folders (not the workspace) with chokidar.
 * Empty paths are skipped; missing folders are picked up once created.
 */
export function watchSourceFiles(projectRoot: string, paths: readonly string[], logger: Logger): SourceWatcher {
  const watchPaths = paths.filter((p) => p !== "").map((p) => resolve(projectRoot, p));
  const watcher = chokidar.watch(watchPaths, {
    persistent: true,
    ignoreInitial: true,
    awaitWriteFinish: {
      stabilityThreshold: 100,
      pollInterval: 50,
    },
  });

  watcher.on("error", (error: unknown) => {
    logger.error("Watcher error", { error: errorMessage(error) });
  });

  const ready = new Promise<void>((done) => {
    watcher.once("ready", () => done());
  });

  logger.debug("Watching source files", { paths: watchPaths });

  return {
    onChange(listener) {
      watcher.on("all", (_event: string, path: string) => listener(path));
    },
    ready() {
      return ready;
    },
    close() {
      return watcher.close();
    },
  };
}

type WakeReason = "change" | "abort";

/**
 * Suspends the loop until the next change or the abort signal. A change
 * that arrives while nothing is waiting is remembered, so the next wait
 * returns at once.
 */
class ChangeWaiter {
  private pending = false;
  private wake: ((reason: WakeReason) => void) | null = null;
  private readonly onAbort = () => this.notify("abort");

  constructor(source: ChangeSource, private readonly signal: AbortSignal, private readonly logger: Logger) {
    source.onChange((path) => {
      this.logger.debug("Source file changed", { path });
      this.pending = true;
      this.notify("change");
    });
    signal.addEventListener("abort", this.onAbort, { once: true });
  }

  private notify(reason: WakeReason) {
    const wake = this.wake;
    if (!wake) { return; }
    this.wake = null;
    if (reason === "change") { this.pending = false; }
    wake(reason);
  }

  next(): Promise<WakeReason> {
    if (this.signal.aborted) { return Promise.resolve("abort"); }
    if (this.pending) {
      this.pending = false;
      return Promise.resolve("change");
    }
    return new Promise((resolve) => {
      this.wake = resolve;
    });
  }

  dispose() {
    this.signal.removeEventListener("abort", this.onAbort);
  }
}

export interface WatchProfileOptions {
  signal: AbortSignal;
  source: ChangeSource;
  run: (ctx: RunContext) => Promise<void>;
}

/**
 * Runs the pipeline, then waits for a change of the sources or the abort
 * signal, and repeats. A failed run is logged and the loop keeps watching.
 * Resolves to the number of runs once aborted; the source is closed on the
 * way out.
 */
export async function watchProfile(ctx: RunContext, options: WatchProfileOptions): Promise<number> {
  const { logger } = ctx;
  const waiter = new ChangeWaiter(options.source, options.signal, logger);
  let runs = 0;
  try {
    while (!options.signal.aborted) {
      runs++;
      try {
        await options.run(ctx);
        logger.info(`Successfully ran the "${ctx.profile}" profile.`);
      } catch (err) {
        logger.error(`Failed to run profile "${ctx.profile}":\n${formatErrorChain(err)}`);
      }
      logger.info("Press Ctrl+C to stop watching.");
      if ((await waiter.next()) === "abort") { break; }
      logger.warn("Restarting...");
    }
  } finally {
    waiter.dispose();
    await options.source.close();
  }
  return runs;
}
