// Command API: one function per CLI command

export { run, watch, DEFAULT_PROFILE, type WatchCommandOptions } from "./run";
export { tool, TOOL_PROFILE } from "./tool";
export { install, installAll, type InstallOptions } from "./install";
export { update, updateAll } from "./update";
export { init, defaultConfigFile, type InitOptions } from "./init";
export { clean, type CleanOptions, type CleanResult } from "./clean";
export { openSession, type CommandOptions, type Session } from "./session";
