/**
 * Check command - Loads config and runs the check pipeline
 */

import chalk from "chalk";
import ora from "ora";
import { z } from "zod";
import {
  CheckTracker,
  IndexError,
  InvalidSelectorError,
  Logger,
  SiteRootError,
  createScanRules,
  describeError,
  loadConfig,
} from "../../utils";
import * as modules from "../../modules";
import { hasFailures } from "../../modules/report";
import type { CheckContext } from "../../types";

const CheckOptionsSchema = z.object({
  config: z.string().optional(),
  report: z.string().optional(),
  duplicateIds: z.boolean().optional(),
  strict: z.boolean().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof CheckOptionsSchema>;

export async function checkCommand(
  directory: string | undefined,
  opts: Options,
): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = CheckOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (directory) {
      config.input.directory = directory;
    }
    if (options.concurrency) {
      config.indexer.concurrency = options.concurrency;
    }
    if (options.duplicateIds || options.strict) {
      config.validate.checkDuplicateIds = true;
    }

    const tracker = new CheckTracker();

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackError(err.path, err.error);
    }

    const ctx: CheckContext = {
      config,
      rules: createScanRules(config.scanner),
      tracker,
      logger: new Logger(options.verbose ? "debug" : config.logging.level),
      verbose: options.verbose,
    };

    // Run check pipeline with spinner updates
    spinner.text = `Indexing ${config.input.directory}...`;
    await modules.indexer(ctx);

    spinner.text = "Validating references...";
    await modules.validate(ctx);

    spinner.clear();
    spinner.stop();

    const stats = await modules.report(ctx, {
      reportPath: options.report,
      strict: options.strict,
    });

    if (hasFailures(stats, options.strict)) {
      process.exitCode = 1;
    }
  } catch (error) {
    if (error instanceof IndexError) {
      spinner.fail("Indexing failed");
      console.error(chalk.red(describeError(error)));
    } else if (error instanceof InvalidSelectorError) {
      spinner.fail("Invalid configuration");
      console.error(chalk.red(error.message));
    } else if (error instanceof SiteRootError) {
      spinner.fail("Nothing to check");
      console.error(chalk.red(error.message));
    } else {
      spinner.fail("Check failed");
      console.error(error);
    }
    process.exit(1);
  }
}
