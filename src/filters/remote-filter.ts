import { join } from "node:path";
import { ConfigError, FilterCheckError } from "../utils/errors";
import { isDirectory } from "../utils/fs";
import { formatZodError, remoteFilterDefinitionSchema } from "../config/schema";
import { checkFilterCollection, runFilterCollection } from "./collection";
import { FilterBase, parseRunConfig, type FilterRunnerOptions } from "./filter";
import { subfilterCollection } from "./subfilters";
import type { FilterInstaller, RunContext } from "./types";

export const HEAD = "HEAD";
export const LATEST = "latest";

export function remoteFilterInstallerFromObject(name: string, obj: unknown): RemoteFilterInstaller {
  const parsed = remoteFilterDefinitionSchema.safeParse(obj);
  if (!parsed.success) {
    throw new ConfigError(`Invalid definition of remote filter "${name}".\n${formatZodError(parsed.error)}`);
  }
  return new RemoteFilterInstaller(name, parsed.data.url, parsed.data.version);
}

export class RemoteFilterInstaller implements FilterInstaller {
  readonly kind = "remote";

  constructor(
    readonly name: string,
    /** repository url without the filter name, e.g. `github.com/owner/filters` */
    readonly url: string,
    /** semver, commit hash, `HEAD` or `latest` */
    readonly version: string
  ) {}

  identity() {
    return `${this.url}/${this.name}==${this.version}`;
  }

  /** One cache directory per filter name under the cache root. */
  downloadPath(dotRegolithPath: string) {
    return join(dotRegolithPath, "cache", "filters", this.name);
  }

  /** `HEAD` and `latest` follow the remote; anything else is pinned. */
  isVersionTracking() {
    return this.version === HEAD || this.version === LATEST;
  }

  createFilterRunner(runConfig: unknown) {
    return new RemoteFilterRunner(this, parseRunConfig(runConfig));
  }

  toObject(): Record<string, unknown> {
    return { url: this.url, version: this.version };
  }
}

export class RemoteFilterRunner extends FilterBase {
  readonly kind = "remote";

  constructor(readonly installer: RemoteFilterInstaller, options: FilterRunnerOptions) {
    super(options);
  }

  private async collection(ctx: RunContext) {
    return subfilterCollection(this, this.installer.downloadPath(ctx.dotRegolithPath));
  }

  async check(ctx: RunContext) {
    const path = this.installer.downloadPath(ctx.dotRegolithPath);
    if (!(await isDirectory(path))) {
      throw new FilterCheckError(
        `Filter "${this.installer.name}" is not installed.\n` +
          `Expected location: ${path}\n` +
          `Run "regolith install-all" to install the filters of the project.`
      );
    }
    await checkFilterCollection(await this.collection(ctx), ctx);
  }

  async run(ctx: RunContext) {
    return runFilterCollection(await this.collection(ctx), ctx);
  }
}
