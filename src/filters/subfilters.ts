import { join } from "node:path";
import { ConfigError, errnoCode } from "../utils/errors";
import { readJson } from "../utils/fs";
import { filterDescriptorSchema, formatZodError, isRemoteDefinition, type FilterDescriptor } from "../config/schema";
import { localFilterInstallerFromObject } from "./local-filter";
import type { FilterCollection, FilterRunner } from "./types";

export const FILTER_DESCRIPTOR = "filter.json";

export async function readFilterDescriptor(downloadPath: string): Promise<FilterDescriptor> {
  const path = join(downloadPath, FILTER_DESCRIPTOR);
  let raw: unknown;
  try {
    raw = await readJson(path);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new ConfigError(`Couldn't read "${path}".`, { cause: err });
    }
    throw new ConfigError(`Couldn't load "${path}". Does the file contain correct JSON?`, { cause: err });
  }
  const parsed = filterDescriptorSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Could not parse filters of "${path}".\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Expands the `filter.json` of an installed remote filter into the runners
 * of its sub-filters, in declared order. Each entry is both the installer
 * definition and the run configuration of its sub-filter. Remote entries are
 * rejected, which keeps the expansion one level deep.
 */
export async function subfilterCollection(parent: FilterRunner, downloadPath: string): Promise<FilterCollection> {
  const descriptor = await readFilterDescriptor(downloadPath);
  const parentId = parent.getId();
  const filters: FilterRunner[] = [];
  for (const [index, entry] of descriptor.filters.entries()) {
    if (typeof entry !== "object" || entry === null || Array.isArray(entry)) {
      throw new ConfigError(`Could not parse filter ${index} of "${join(downloadPath, FILTER_DESCRIPTOR)}".`);
    }
    if (isRemoteDefinition(entry)) {
      throw new ConfigError(
        `Remote filters are not allowed in subfilters. Remote filter "${parentId}" subfilter ${index}.`
      );
    }
    const id = `${parentId}:subfilter${index}`;
    try {
      const installer = localFilterInstallerFromObject(id, entry, downloadPath);
      const runner = installer.createFilterRunner({ ...entry, filter: id });
      runner.copyArguments(parent);
      filters.push(runner);
    } catch (err) {
      throw new ConfigError(`Could not parse filter ${index} of "${join(downloadPath, FILTER_DESCRIPTOR)}".`, {
        cause: err,
      });
    }
  }
  return { filters };
}
