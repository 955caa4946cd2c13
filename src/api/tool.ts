import { ConfigError, FilterCheckError, FilterRunError, wrapError } from "../utils/errors";
import { loadConfig } from "../config/config";
import { withSessionLock } from "../lock/session-lock";
import { inplaceExportProject } from "../pipeline/export";
import { removeWorkspaceData } from "../pipeline/pipeline";
import { setupTmpFiles } from "../pipeline/stage";
import { workspacePath, type FilterRunner } from "../filters/types";
import type { Config } from "../config/types";
import { createRunContext, openSession, type CommandOptions } from "./session";

export const TOOL_PROFILE = "[dynamic profile]";

/**
 * `regolith tool`: runs one filter with the given arguments and writes the
 * result straight back into the project's source folders.
 */
export async function tool(filterName: string, filterArgs: string[], opts: CommandOptions = {}) {
  const session = openSession(opts);
  const { logger } = session;
  let config: Config;
  try {
    config = await loadConfig(session.projectRoot);
  } catch (err) {
    throw wrapError(err, 'Could not load "config.json".');
  }
  const installer = config.filterDefinitions.get(filterName);
  if (!installer) {
    throw new ConfigError(
      `Unable to find the filter on the "filterDefinitions" list of the "config.json" file.\nFilter name: ${filterName}`
    );
  }

  await withSessionLock(
    session.dotRegolithPath,
    async () => {
      let runner: FilterRunner;
      try {
        runner = installer.createFilterRunner({ filter: filterName, arguments: filterArgs });
      } catch (err) {
        throw wrapError(err, `Failed to create the runner of filter "${filterName}".`);
      }
      const ctx = createRunContext(session, config, TOOL_PROFILE);

      try {
        await runner.check(ctx);
      } catch (err) {
        throw new FilterCheckError(`Filter check failed.\nFilter: ${filterName}`, { cause: err });
      }

      await setupTmpFiles(config, session.projectRoot, workspacePath(ctx), logger);

      logger.info(`Running the "${filterName}" filter.`);
      try {
        await runner.run(ctx);
      } catch (err) {
        throw new FilterRunError(`Failed to run filter.\nFilter: ${filterName}`, { cause: err });
      }

      logger.info("Overwriting the source files.");
      try {
        await inplaceExportProject(config, session.projectRoot, workspacePath(ctx), logger);
      } catch (err) {
        throw wrapError(err, "Failed to overwrite the source files with generated files.");
      }
      await removeWorkspaceData(ctx);
    },
    logger
  );
  logger.info(`Successfully ran the "${filterName}" filter.`);
}
