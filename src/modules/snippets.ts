/**
 * Snippets Module
 * Converts every snippet referenced inline and writes their attribute definitions
 */

import { readFile, writeFile, mkdir } from "fs/promises";
import path from "node:path";
import { parseDocument } from "../utils";
import type { PipelineContext } from "../types";

export async function snippets(ctx: PipelineContext): Promise<void> {
  const { config, tracker, logger, snippets: registry, converter } = ctx;

  if (!registry || !converter) {
    throw new Error("Processor must run before snippets");
  }

  const inputDir = path.resolve(config.input);
  const converted = ctx.convertedSnippets ?? new Map<string, string | undefined>();

  // Converting a snippet may register nested snippets, load() visits those too.
  // Snippet files the scanner found were converted by the processor already.
  await registry.load(async (entry) => {
    if (converted.has(entry.path)) {
      return converted.get(entry.path);
    }

    const label = path.relative(inputDir, entry.path);
    let stage: "read" | "parse" = "read";

    try {
      const source = await readFile(entry.path, config.files.encoding);

      stage = "parse";
      return converter.convert(parseDocument(source), label, entry.path);
    } catch (error) {
      // Only this snippet is left undefined, the others still load
      tracker.trackError(label, error, "file", stage);
      logger.debug(`Failed snippet ${label}`);
      return undefined;
    }
  });

  const defined = registry.list().filter((entry) => entry.content !== undefined);
  tracker.setDefinedSnippets(defined.length);
  tracker.setKnownSnippets(ctx.knownSnippets.size);

  const definitions = registry.definitions();
  if (!definitions || ctx.dryRun) {
    return;
  }

  const outputPath = path.join(config.output, config.snippets.definitionsFile);
  await mkdir(path.dirname(outputPath), { recursive: true });
  await writeFile(outputPath, definitions, "utf-8");
  logger.debug(`Wrote ${defined.length} snippet definitions to ${outputPath}`);
}
