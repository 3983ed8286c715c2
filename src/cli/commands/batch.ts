/**
 * Batch command - Loads config, wires collaborators and runs the batch
 */

import ora from "ora";
import { z } from "zod";
import { PreconditionError } from "../../errors";
import { loadConfig, Logger, Tracker } from "../../utils";
import { createRenderer } from "../../renderers";
import { ConfluenceStore } from "../../stores";
import { TerminalPrompt } from "../../prompts";
import * as modules from "../../modules";
import type { RunContext } from "../../types";
import { BATCH_USAGE, reportFatal } from "../usage";

const BatchOptionsSchema = z.object({
  datafile: z.string().optional(),
  username: z.string().optional(),
  baseUrl: z.string().optional(),
  config: z.string().optional(),
  // commander hands option values over as strings
  timeout: z
    .union([z.string(), z.number()])
    .pipe(z.coerce.number().int().nonnegative())
    .optional(),
  engine: z.enum(["builtin", "vimdiff"]).optional(),
  strict: z.boolean().optional(),
  pause: z.boolean().optional(),
  yes: z.boolean().optional(),
  report: z.string().optional(),
  debug: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof BatchOptionsSchema>;

function optionFlag(key: string | number): string {
  return `--${String(key).replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}`;
}

function parseOptions(opts: Options): z.output<typeof BatchOptionsSchema> {
  const parsed = BatchOptionsSchema.safeParse(opts);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${optionFlag(issue.path[0] ?? "")}: ${issue.message}`)
      .join("; ");
    throw new PreconditionError(`Invalid command line option (${details})`);
  }
  return parsed.data;
}

export async function batchCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Loading configuration...", indent: 2 }).start();

  try {
    const options = parseOptions(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.baseUrl) config.confluence.baseUrl = options.baseUrl;
    if (options.timeout !== undefined) {
      config.confluence.timeout = options.timeout;
      config.renderer.timeout = options.timeout;
    }
    if (options.engine) config.renderer.engine = options.engine;
    if (options.strict) config.batch.strict = true;
    if (options.pause === false) config.batch.pauseBetweenRows = false;
    if (options.yes) config.batch.overwrite = "always";

    const logger = new Logger(options.debug ? "debug" : config.logging.level);
    const tracker = new Tracker();

    if (errors.length > 0) {
      spinner.stop();
      for (const err of errors) {
        tracker.trackError(err.path, err.error, "resource");
        logger.warn(`Ignoring invalid configuration file "${err.path}"`);
      }
    }

    // Runs until the password prompt stops it
    spinner.start("Validating batch file...");

    const ctx: RunContext = {
      config,
      tracker,
      logger,
      contentStore: new ConfluenceStore({
        config: config.confluence,
        logger,
        debug: options.debug,
      }),
      diffRenderer: createRenderer(config.renderer),
      prompt: new TerminalPrompt(spinner),
      debug: options.debug,
      verbose: options.verbose,
    };

    const result = await modules.runBatch(ctx, options.datafile ?? "", options.username ?? "");
    spinner.stop();

    modules.summary(ctx, result);

    if (options.report) {
      await tracker.exportReport(options.report, result);
    }

    process.exitCode = modules.batchExitCode(result, config.batch.strict);
  } catch (error) {
    spinner.stop();
    if (error instanceof PreconditionError) {
      reportFatal(error, BATCH_USAGE);
    } else {
      console.error(error);
    }
    process.exitCode = 1;
  }
}
