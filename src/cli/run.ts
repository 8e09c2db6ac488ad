import { HELP_TEXT, parseCliArgs } from "./args.js";
import { renderWaveformImage, type PipelineDeps } from "../pipeline.js";
import { isWaveformError } from "../errors.js";
import { describeError, formatError } from "../utils/formatError.js";

/**
 * Run one invocation and return the process exit code: 0 for a rendered
 * image or `--help`, 1 for any failure. Usage errors also print the help.
 */
export async function runCli(argv: readonly string[], deps: PipelineDeps): Promise<number> {
  const { logger } = deps;
  try {
    const command = parseCliArgs(argv);
    if (command.kind === "help") {
      logger.info(HELP_TEXT);
      return 0;
    }
    await renderWaveformImage(command.config, deps);
    return 0;
  } catch (err) {
    if (isWaveformError(err) && err.code === "UsageError") {
      // A bare invocation just gets the usage text.
      if (argv.length > 0) logger.error(formatError(err));
      logger.info(HELP_TEXT);
      return 1;
    }
    const [message, ...causes] = describeError(err);
    logger.error(isWaveformError(err) ? message : `Unexpected error: ${message}`);
    for (const line of causes) logger.error(line);
    return 1;
  }
}
