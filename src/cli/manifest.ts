/**
 * Regolith CLI manifest
 */

import type { CommandModule } from './types';

export type FlagDefinition = {
  name: string;
  type: 'string' | 'boolean';
  alias?: string;
  description?: string;
};

export type CommandManifest = {
  id: string;
  describe: string;
  longDescription?: string;
  /** positional arguments, for help output */
  usage?: string;
  flags?: FlagDefinition[];
  /** everything after the first positional argument is passed on untouched */
  rawArgs?: boolean;
  examples?: string[];
  loader: () => Promise<CommandModule>;
};

export const globalFlags: FlagDefinition[] = [
  {
    name: 'debug',
    type: 'boolean',
    description: 'Enable debug logging',
  },
  {
    name: 'help',
    type: 'boolean',
    alias: 'h',
    description: 'Show help',
  },
];

const forceFlag = (description: string): FlagDefinition => ({
  name: 'force',
  type: 'boolean',
  alias: 'f',
  description,
});

export const commands: CommandManifest[] = [
  {
    id: 'run',
    describe: 'Run a profile and export its packs',
    longDescription: 'Check, stage, run and export the filters of a profile once',
    usage: '[profile]',
    examples: ['regolith run', 'regolith run build'],
    loader: async () => import('./run'),
  },
  {
    id: 'watch',
    describe: 'Run a profile on every change of the source files',
    longDescription: 'Run a profile, then run it again whenever the resource, behavior or data folder changes. Stop with Ctrl+C.',
    usage: '[profile]',
    examples: ['regolith watch', 'regolith watch dev'],
    loader: async () => import('./watch'),
  },
  {
    id: 'tool',
    describe: 'Run one filter and overwrite the source files with its output',
    usage: '<filter> [args...]',
    rawArgs: true,
    examples: ['regolith tool name_ninja --language en_US'],
    loader: async () => import('./tool'),
  },
  {
    id: 'install',
    describe: 'Download filters and add them to the filter definitions',
    longDescription: 'Specifiers take the form <repository-url>/<filter-name>[==<version>], where version is a semantic version, a commit hash, HEAD or latest',
    usage: '<specifiers...>',
    flags: [forceFlag('Reinstall filters that are already defined')],
    examples: [
      'regolith install github.com/Bedrock-OSS/regolith-filters/name_ninja',
      'regolith install github.com/Bedrock-OSS/regolith-filters/name_ninja==1.0.0 --force',
    ],
    loader: async () => import('./install'),
  },
  {
    id: 'install-all',
    describe: 'Install every remote filter of the filter definitions',
    flags: [forceFlag('Download the filters even if they are in the cache')],
    examples: ['regolith install-all'],
    loader: async () => import('./install-all'),
  },
  {
    id: 'update',
    describe: 'Update the named remote filters',
    usage: '<filters...>',
    examples: ['regolith update name_ninja'],
    loader: async () => import('./update'),
  },
  {
    id: 'update-all',
    describe: 'Update every remote filter that tracks HEAD or latest',
    examples: ['regolith update-all'],
    loader: async () => import('./update-all'),
  },
  {
    id: 'init',
    describe: 'Create a new project in the working directory',
    flags: [forceFlag('Initialize even if the directory is not empty')],
    examples: ['regolith init'],
    loader: async () => import('./init'),
  },
  {
    id: 'clean',
    describe: 'Delete the cache of the project',
    flags: [
      {
        name: 'user-cache',
        type: 'boolean',
        description: 'Delete the cached data of every project in the user cache directory instead',
      },
    ],
    examples: ['regolith clean', 'regolith clean --user-cache'],
    loader: async () => import('./clean'),
  },
];

export function findCommand(id: string) {
  return commands.find((command) => command.id === id);
}
