import { ConfigError } from "../utils/errors";
import { checkFilterCollection, runFilterCollection } from "./collection";
import { deriveContext, type FilterRunner, type RunContext } from "./types";

export const MAX_PROFILE_DEPTH = 16;

/**
 * A profile entry of the form `{"profile": "<name>"}`. It runs the filters of
 * the referenced profile against the workspace the outermost run staged;
 * staging and export stay with the outermost profile.
 */
export class ProfileFilterRunner implements FilterRunner {
  readonly kind = "profile";
  readonly arguments: readonly string[] = [];
  readonly settings: Readonly<Record<string, unknown>> = {};

  constructor(readonly profileName: string) {}

  private resolve(ctx: RunContext) {
    const chain: string[] = [];
    for (let current: RunContext | undefined = ctx; current; current = current.parent) {
      chain.unshift(current.profile);
      if (current.profile === this.profileName) {
        throw new ConfigError(`Profile "${this.profileName}" references itself: ${[...chain, this.profileName].join(" -> ")}`);
      }
    }
    if (chain.length >= MAX_PROFILE_DEPTH) {
      throw new ConfigError(`Profiles are nested deeper than ${MAX_PROFILE_DEPTH} levels: ${chain.join(" -> ")}`);
    }
    const profile = ctx.config.profiles.get(this.profileName);
    if (!profile) {
      throw new ConfigError(`Profile "${this.profileName}" does not exist in the configuration.`);
    }
    return { profile, child: deriveContext(ctx, this.profileName) };
  }

  async check(ctx: RunContext) {
    const { profile, child } = this.resolve(ctx);
    await checkFilterCollection(profile, child);
  }

  async run(ctx: RunContext) {
    const { profile, child } = this.resolve(ctx);
    return runFilterCollection(profile, child);
  }

  isDisabled() {
    return false;
  }

  getId() {
    return "";
  }

  copyArguments() {
    // a profile reference has nothing to take over
  }

  toObject() {
    return { profile: this.profileName };
  }
}
