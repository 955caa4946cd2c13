import { isAbsolute, resolve } from "node:path";
import type { z } from "zod";
import { ConfigError, FilterCheckError } from "../utils/errors";
import { exists } from "../utils/fs";
import { runCommand } from "../utils/runCommand";
import {
  LOCAL_FILTER_KINDS,
  formatZodError,
  localFilterDefinitionSchema,
  type LocalFilterKind,
} from "../config/schema";
import { FilterBase, parseRunConfig, type FilterRunnerOptions } from "./filter";
import { workspacePath, type FilterInstaller, type RunContext } from "./types";

export type LocalFilterDefinition = z.infer<typeof localFilterDefinitionSchema>;

function isLocalFilterKind(value: unknown): value is LocalFilterKind {
  return LOCAL_FILTER_KINDS.some((kind) => kind === value);
}

/**
 * Builds the installer of a filter whose payload is under project control.
 * `scriptRoot` is the directory script paths are relative to; project
 * filters leave it out and resolve against the project root at run time.
 */
export function localFilterInstallerFromObject(name: string, obj: unknown, scriptRoot?: string): LocalFilterInstaller {
  const runWith = typeof obj === "object" && obj !== null && "runWith" in obj ? obj.runWith : undefined;
  if (runWith === undefined) {
    throw new ConfigError(`Filter "${name}" has neither "runWith" nor "url".`);
  }
  if (!isLocalFilterKind(runWith)) {
    throw new ConfigError(
      `Unsupported filter kind "${String(runWith)}" of filter "${name}". ` +
        `Supported kinds: ${LOCAL_FILTER_KINDS.join(", ")}.`
    );
  }
  const parsed = localFilterDefinitionSchema.safeParse(obj);
  if (!parsed.success) {
    throw new ConfigError(`Invalid definition of filter "${name}".\n${formatZodError(parsed.error)}`);
  }
  return new LocalFilterInstaller(name, parsed.data, scriptRoot);
}

export class LocalFilterInstaller implements FilterInstaller {
  readonly kind = "local";

  constructor(
    readonly name: string,
    readonly definition: LocalFilterDefinition,
    readonly scriptRoot?: string
  ) {}

  identity() {
    const def = this.definition;
    switch (def.runWith) {
      case "python":
      case "nodejs":
        return `${def.runWith}:${def.script}`;
      case "shell":
        return `shell:${def.command}`;
      case "exe":
        return `exe:${def.exe}`;
    }
  }

  downloadPath() {
    return null;
  }

  createFilterRunner(runConfig: unknown) {
    return new LocalFilterRunner(this.definition, parseRunConfig(runConfig), this.scriptRoot);
  }

  toObject(): Record<string, unknown> {
    return { ...this.definition };
  }
}

type Invocation = { cmd: string; args: string[]; shell: boolean };

const SAFE_SHELL_ARG = /^[\w@%+=:,./-]+$/;

function quoteShellArg(arg: string) {
  if (SAFE_SHELL_ARG.test(arg)) { return arg; }
  if (process.platform === "win32") { return `"${arg.replace(/"/g, '""')}"`; }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export class LocalFilterRunner extends FilterBase {
  readonly kind = "local";

  constructor(
    readonly definition: LocalFilterDefinition,
    options: FilterRunnerOptions,
    readonly scriptRoot?: string
  ) {
    super(options);
  }

  private root(ctx: RunContext) {
    return this.scriptRoot ?? ctx.absoluteLocation;
  }

  private resolvePath(ctx: RunContext, p: string) {
    return isAbsolute(p) ? p : resolve(this.root(ctx), p);
  }

  /** The settings JSON goes first, and only when there are settings. */
  private filterArgs() {
    const args = [...this.arguments];
    if (Object.keys(this.settings).length > 0) {
      args.unshift(JSON.stringify(this.settings));
    }
    return args;
  }

  private invocation(ctx: RunContext): Invocation {
    const def = this.definition;
    const args = this.filterArgs();
    switch (def.runWith) {
      case "python":
        return { cmd: ctx.settings.pythonCommand, args: ["-u", this.resolvePath(ctx, def.script), ...args], shell: false };
      case "nodejs":
        return { cmd: "node", args: [this.resolvePath(ctx, def.script), ...args], shell: false };
      case "exe":
        return { cmd: this.resolvePath(ctx, def.exe), args, shell: false };
      case "shell":
        return { cmd: [def.command, ...args.map(quoteShellArg)].join(" "), args: [], shell: true };
    }
  }

  private async requireRuntime(cmd: string, label: string) {
    let ok: boolean;
    try {
      const { code } = await runCommand(cmd, ["--version"], { stdio: "pipe", allowFail: true });
      ok = code === 0;
    } catch (err) {
      throw new FilterCheckError(`${label} is required by filter "${this.id}" but "${cmd}" could not be started.`, {
        cause: err,
      });
    }
    if (!ok) {
      throw new FilterCheckError(`${label} is required by filter "${this.id}" but "${cmd} --version" failed.`);
    }
  }

  private async requireFile(ctx: RunContext, p: string, what: string) {
    const abs = this.resolvePath(ctx, p);
    if (!(await exists(abs))) {
      throw new FilterCheckError(`The ${what} of filter "${this.id}" does not exist: ${abs}`);
    }
  }

  async check(ctx: RunContext) {
    const def = this.definition;
    switch (def.runWith) {
      case "python":
        await this.requireRuntime(ctx.settings.pythonCommand, "Python");
        await this.requireFile(ctx, def.script, "script");
        return;
      case "nodejs":
        await this.requireRuntime("node", "Node.js");
        await this.requireFile(ctx, def.script, "script");
        return;
      case "exe":
        await this.requireFile(ctx, def.exe, "executable");
        return;
      case "shell":
        return;
    }
  }

  async run(ctx: RunContext) {
    const { cmd, args, shell } = this.invocation(ctx);
    ctx.logger.debug("Filter command", { filter: this.id, cmd, args });
    await runCommand(cmd, args, {
      cwd: workspacePath(ctx),
      shell,
      stdio: "inherit",
      logger: ctx.logger,
      env: {
        ROOT_DIR: ctx.absoluteLocation,
        FILTER_DIR: this.root(ctx),
      },
    });
    return true;
  }
}
