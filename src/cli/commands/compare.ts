/**
 * Compare command - Renders one file pair to HTML
 */

import { rm } from "fs/promises";
import ora from "ora";
import { z } from "zod";
import { DiffpressError, PreconditionError } from "../../errors";
import { fileExists, loadConfig, Logger, normalizeOutputPath, withTimeout } from "../../utils";
import { createRenderer } from "../../renderers";
import { TerminalPrompt } from "../../prompts";
import { CANCELLED } from "../../types";
import { COMPARE_USAGE, reportFatal } from "../usage";

const CompareOptionsSchema = z.object({
  infile1: z.string().optional(),
  infile2: z.string().optional(),
  outfile: z.string().optional(),
  colorscheme: z.string().min(1).optional(),
  engine: z.enum(["builtin", "vimdiff"]).optional(),
  config: z.string().optional(),
  yes: z.boolean().optional(),
  debug: z.boolean().optional(),
});

type Options = z.input<typeof CompareOptionsSchema>;

export async function compareCommand(opts: Options): Promise<void> {
  try {
    const options = CompareOptionsSchema.parse(opts);
    const { infile1, infile2, outfile } = options;

    if (!infile1 || !infile2 || !outfile) {
      throw new PreconditionError("--infile1, --infile2 and --outfile are all required");
    }

    const { config, errors } = await loadConfig(options.config);
    if (options.engine) config.renderer.engine = options.engine;

    const logger = new Logger(options.debug ? "debug" : config.logging.level);
    for (const err of errors) {
      logger.warn(`Ignoring invalid configuration file "${err.path}"`);
    }

    const outputPath = normalizeOutputPath(outfile);

    if ((await fileExists(outputPath)) && !options.yes) {
      const answer = await new TerminalPrompt().confirm(
        `Filename "${outputPath}" exists ... overwrite?`,
      );
      if (answer === CANCELLED || !answer) {
        console.log("\nOperation cancelled by user");
        return;
      }
      logger.warn(`Local file "${outputPath}" will be removed`);
    }
    await rm(outputPath, { force: true });

    const renderer = createRenderer(config.renderer);
    const spinner = ora({ text: `Comparing with ${renderer.name}...`, indent: 2 }).start();

    try {
      const result = await withTimeout("Rendering", config.renderer.timeout, (signal) =>
        renderer.render({
          fileA: infile1,
          fileB: infile2,
          outputPath,
          colorScheme: options.colorscheme ?? config.renderer.colorScheme,
          signal,
        }),
      );

      spinner.succeed(
        result.changedLines > 0
          ? `Differences were found · created "${outputPath}" with color coded differences`
          : `NO differences were found · created "${outputPath}"`,
      );
    } catch (error) {
      spinner.fail("Comparison failed");
      throw error;
    }
  } catch (error) {
    if (error instanceof DiffpressError) {
      reportFatal(error, COMPARE_USAGE);
    } else {
      console.error(error);
    }
    process.exitCode = 1;
  }
}
