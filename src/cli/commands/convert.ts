/**
 * Convert command - Loads config and runs conversion pipeline
 */

import ora from "ora";
import { z } from "zod";
import { loadConfig, loadKnownSnippets, Tracker, Logger } from "../../utils";
import * as modules from "../../modules";
import type { PipelineContext } from "../../types";

const ConvertOptionsSchema = z.object({
  input: z.string().optional(),
  output: z.string().optional(),
  config: z.string().optional(),
  knownSnippets: z.string().optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof ConvertOptionsSchema>;

export async function convertCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = ConvertOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.input) {
      config.input = options.input;
    }
    if (options.output) {
      config.output = options.output;
    }

    const tracker = new Tracker();
    const logger = new Logger(options.verbose ? "debug" : config.logging.level);

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackError(err.path, err.error, "resource");
    }

    const knownSnippets = new Set(config.snippets.known);
    if (options.knownSnippets) {
      try {
        for (const name of await loadKnownSnippets(options.knownSnippets)) {
          knownSnippets.add(name);
        }
      } catch (error) {
        tracker.trackError(options.knownSnippets, error, "resource");
      }
    }

    const ctx: PipelineContext = {
      config,
      tracker,
      logger,
      knownSnippets,
      dryRun: options.dryRun,
      verbose: options.verbose,
    };

    // Run conversion pipeline with spinner updates
    spinner.text = "Scanning files...";
    await modules.scan(ctx);

    spinner.text = "Converting files...";
    await modules.process(ctx);

    spinner.text = "Converting snippets...";
    await modules.snippets(ctx);

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    // Export and display stats
    await modules.stats(ctx);

    if (tracker.getStats().failedFiles > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail("Conversion failed");
    console.error(error);
    process.exit(1);
  }
}
