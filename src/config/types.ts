import type { FilterCollection, FilterInstaller } from "../filters/types";
import type { ExportTargetKind } from "./schema";

export interface ExportTarget {
  target: ExportTargetKind;
  readOnly: boolean;
  rpPath?: string;
  bpPath?: string;
}

export interface Profile extends FilterCollection {
  exportTarget: ExportTarget;
}

export interface Packs {
  resourceFolder: string;
  behaviorFolder: string;
}

/**
 * In-memory project configuration. Loaded once per command and not changed
 * while the command runs.
 */
export interface Config {
  name: string;
  author: string;
  packs: Packs;
  dataPath: string;
  filterDefinitions: Map<string, FilterInstaller>;
  profiles: Map<string, Profile>;
}
