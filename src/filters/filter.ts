import { ConfigError } from "../utils/errors";
import { filterRunConfigSchema, formatZodError } from "../config/schema";
import type { FilterEntryObject, FilterRunner, RunContext } from "./types";

export interface FilterRunnerOptions {
  id: string;
  arguments: string[];
  settings: Record<string, unknown>;
  disabled: boolean;
}

/**
 * Validates a profile entry that points at a filter definition.
 */
export function parseRunConfig(runConfig: unknown): FilterRunnerOptions {
  const parsed = filterRunConfigSchema.safeParse(runConfig);
  if (!parsed.success) {
    throw new ConfigError(`Invalid filter run configuration.\n${formatZodError(parsed.error)}`);
  }
  const { filter, ...rest } = parsed.data;
  return { id: filter, ...rest };
}

/** Shared state and bookkeeping of runners backed by a filter definition. */
export abstract class FilterBase implements FilterRunner {
  abstract readonly kind: "local" | "remote";
  readonly id: string;
  arguments: string[];
  settings: Record<string, unknown>;
  readonly disabled: boolean;

  constructor(options: FilterRunnerOptions) {
    this.id = options.id;
    this.arguments = options.arguments;
    this.settings = options.settings;
    this.disabled = options.disabled;
  }

  abstract check(ctx: RunContext): Promise<void>;
  abstract run(ctx: RunContext): Promise<boolean>;

  isDisabled() {
    return this.disabled;
  }

  getId() {
    return this.id;
  }

  /**
   * Project-level overrides of a remote filter apply to every one of its
   * sub-filters; empty values on the parent leave the sub-filter's own.
   */
  copyArguments(parent: FilterRunner) {
    if (parent.arguments.length > 0) {
      this.arguments = [...parent.arguments];
    }
    if (Object.keys(parent.settings).length > 0) {
      this.settings = { ...parent.settings };
    }
  }

  toObject(): FilterEntryObject {
    const obj: FilterEntryObject = { filter: this.id };
    if (this.arguments.length > 0) { obj.arguments = [...this.arguments]; }
    if (Object.keys(this.settings).length > 0) { obj.settings = { ...this.settings }; }
    if (this.disabled) { obj.disabled = true; }
    return obj;
  }
}
