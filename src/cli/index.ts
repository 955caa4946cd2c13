import { parseArgs } from 'node:util';
import { errorMessage, formatErrorChain } from '../utils/errors';
import { commands, findCommand, globalFlags, type CommandManifest, type FlagDefinition } from './manifest';
import type { CliContext, Flags } from './types';

export { consolePresenter, type CliContext, type Presenter } from './types';

type ParsedInput = { positionals: string[]; flags: Flags };

function flagDefinitions(command?: CommandManifest): FlagDefinition[] {
  return [...globalFlags, ...(command?.flags ?? [])];
}

function parseFlags(tokens: string[], definitions: FlagDefinition[]): ParsedInput {
  const options: Record<string, { type: 'string' | 'boolean'; short?: string }> = {};
  for (const flag of definitions) {
    options[flag.name] = flag.alias ? { type: flag.type, short: flag.alias } : { type: flag.type };
  }
  const { values, positionals } = parseArgs({ args: tokens, options, allowPositionals: true, strict: true });
  const flags: Flags = {};
  for (const [name, value] of Object.entries(values)) {
    if (typeof value === 'string' || typeof value === 'boolean') {
      flags[name] = value;
    }
  }
  return { positionals, flags };
}

/**
 * Flags are read up to the first positional argument; the rest is kept
 * as is, so `tool` can hand options over to the filter.
 */
function parseRawInput(tokens: string[], definitions: FlagDefinition[]): ParsedInput {
  const first = tokens.findIndex((token) => !token.startsWith('-'));
  if (first === -1) {
    return parseFlags(tokens, definitions);
  }
  const { flags } = parseFlags(tokens.slice(0, first), definitions);
  return { positionals: tokens.slice(first), flags };
}

function formatFlags(definitions: FlagDefinition[]) {
  return definitions.map((flag) => {
    const names = flag.alias ? `-${flag.alias}, --${flag.name}` : `    --${flag.name}`;
    return `  ${names.padEnd(20)} ${flag.description ?? ''}`;
  });
}

export function generalHelp(): string {
  const width = Math.max(...commands.map((command) => command.id.length));
  return [
    'Usage: regolith [options] <command> [options]',
    '',
    'Commands:',
    ...commands.map((command) => `  ${command.id.padEnd(width)}  ${command.describe}`),
    '',
    'Options:',
    ...formatFlags(globalFlags),
    '',
    'Run "regolith <command> --help" for the options of a command.',
  ].join('\n');
}

export function commandHelp(command: CommandManifest): string {
  const lines = [
    `Usage: regolith ${command.id}${command.usage ? ` ${command.usage}` : ''} [options]`,
    '',
    command.longDescription ?? command.describe,
    '',
    'Options:',
    ...formatFlags(flagDefinitions(command)),
  ];
  if (command.examples && command.examples.length > 0) {
    lines.push('', 'Examples:', ...command.examples.map((example) => `  ${example}`));
  }
  return lines.join('\n');
}

/**
 * Runs one CLI invocation (`argv` without the node and script paths) and
 * resolves to the process exit code. Errors are printed with their cause
 * chain.
 */
export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  // options may come before the command: `regolith --debug run`
  const at = argv.findIndex((token) => !token.startsWith('-'));
  const leading = at === -1 ? argv : argv.slice(0, at);
  const id = at === -1 ? undefined : argv[at];
  if (id === undefined) {
    const help = leading.includes('--help') || leading.includes('-h');
    ctx.presenter.write(generalHelp());
    return help ? 0 : 1;
  }
  const rest = [...leading, ...argv.slice(at + 1)];
  const command = findCommand(id);
  if (!command) {
    ctx.presenter.error(`Unknown command "${id}".\n\n${generalHelp()}`);
    return 1;
  }

  let input: ParsedInput;
  try {
    const definitions = flagDefinitions(command);
    input = command.rawArgs ? parseRawInput(rest, definitions) : parseFlags(rest, definitions);
  } catch (err) {
    ctx.presenter.error(`${errorMessage(err)}\n\n${commandHelp(command)}`);
    return 1;
  }
  if (input.flags.help === true) {
    ctx.presenter.write(commandHelp(command));
    return 0;
  }

  try {
    const loaded = await command.loader();
    return (await loaded.run(ctx, input.positionals, input.flags)) ?? 0;
  } catch (err) {
    ctx.presenter.error(formatErrorChain(err));
    return 1;
  }
}
