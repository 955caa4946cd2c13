import { FilterCheckError, FilterRunError } from "../utils/errors";
import type { FilterCollection, FilterRunner, RunContext } from "./types";

const ORDINAL_SUFFIXES = ["th", "st", "nd", "rd"];

/** 0 -> "1st", 1 -> "2nd", 10 -> "11th" */
export function nth(index: number) {
  const n = index + 1;
  const mod100 = n % 100;
  const suffix = mod100 >= 11 && mod100 <= 13 ? "th" : ORDINAL_SUFFIXES[n % 10] ?? "th";
  return `${n}${suffix}`;
}

function describe(filter: FilterRunner, index: number) {
  const id = filter.getId();
  return id ? `${id} (${nth(index)} filter)` : `${nth(index)} filter`;
}

/**
 * Checks every filter in order, disabled ones included: disabling a filter
 * skips its run, not its validation.
 */
export async function checkFilterCollection(collection: FilterCollection, ctx: RunContext): Promise<void> {
  for (const [index, filter] of collection.filters.entries()) {
    try {
      await filter.check(ctx);
    } catch (err) {
      throw new FilterCheckError(
        `Filter check failed.\nFilter: ${describe(filter, index)}\nProfile: ${ctx.profile}`,
        { cause: err }
      );
    }
  }
}

/**
 * Runs the enabled filters one after another against the shared workspace.
 * Resolves to whether any of them modified it.
 */
export async function runFilterCollection(collection: FilterCollection, ctx: RunContext): Promise<boolean> {
  let modified = false;
  for (const [index, filter] of collection.filters.entries()) {
    const id = filter.getId();
    if (filter.isDisabled()) {
      ctx.logger.info(`Filter "${id}" is disabled, skipping.`);
      continue;
    }
    // nested profiles have no id and log their own filters
    if (id) {
      ctx.logger.info(`Running filter ${id}`);
    }
    const start = Date.now();
    try {
      modified = (await filter.run(ctx)) || modified;
    } catch (err) {
      throw new FilterRunError(
        `Failed to run filter.\nFilter: ${describe(filter, index)}\nProfile: ${ctx.profile}`,
        { cause: err }
      );
    }
    ctx.logger.debug(`Executed in ${Date.now() - start}ms`, { filter: id || undefined });
  }
  return modified;
}
