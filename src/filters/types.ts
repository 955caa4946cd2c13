import { join } from "node:path";
import type { Config } from "../config/types";
import type { Settings } from "../config/settings";
import type { Logger } from "../utils/logger";

/**
 * Request-scoped values a filter needs while it is checked or run. Created
 * fresh for every pipeline invocation; nested profiles derive a child
 * context that points back at its parent.
 */
export interface RunContext {
  readonly config: Config;
  readonly profile: string;
  readonly parent?: RunContext;
  /** absolute path of the project root */
  readonly absoluteLocation: string;
  /** cache root (`.regolith` or its app-data counterpart) */
  readonly dotRegolithPath: string;
  readonly settings: Settings;
  readonly logger: Logger;
}

export function deriveContext(parent: RunContext, profile: string): RunContext {
  return { ...parent, profile, parent };
}

/** Scratch workspace filters run in. */
export function workspacePath(ctx: Pick<RunContext, "dotRegolithPath">) {
  return join(ctx.dotRegolithPath, "tmp");
}

export interface FilterEntryObject {
  filter: string;
  arguments?: string[];
  settings?: Record<string, unknown>;
  disabled?: boolean;
}

/** The JSON form of a profile entry. */
export type FilterRunnerObject = { profile: string } | FilterEntryObject;

export interface FilterRunner {
  readonly kind: "local" | "remote" | "profile";
  /** arguments and settings shared with sub-filters through {@link copyArguments} */
  readonly arguments: readonly string[];
  readonly settings: Readonly<Record<string, unknown>>;

  /** Validates prerequisites without touching the workspace. */
  check(ctx: RunContext): Promise<void>;
  /** Runs against the staged workspace; resolves to whether it was modified. */
  run(ctx: RunContext): Promise<boolean>;
  isDisabled(): boolean;
  /** Empty for pure containers such as nested profile references. */
  getId(): string;
  copyArguments(parent: FilterRunner): void;
  toObject(): FilterRunnerObject;
}

export interface FilterCollection {
  readonly filters: FilterRunner[];
}

export interface FilterInstaller {
  readonly kind: "local" | "remote";
  readonly name: string;
  /** Human readable identity: path/command for local filters, url + version for remote ones. */
  identity(): string;
  /** Where the payload lives on disk, `null` when it is under project control. */
  downloadPath(dotRegolithPath: string): string | null;
  /** Binds a profile entry (`{"filter": ..., "arguments": ...}`) to this filter. */
  createFilterRunner(runConfig: unknown): FilterRunner;
  toObject(): Record<string, unknown>;
}
