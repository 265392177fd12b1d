/**
 * Processor Module
 * Converts files one at a time and writes immediately to avoid memory bloat
 */

import { readFile, writeFile, mkdir } from "fs/promises";
import { dirname } from "node:path";
import { createConverter, SnippetRegistry } from "../converter";
import { parseDocument } from "../utils";
import type { PipelineContext, FileDescriptor } from "../types";

export async function process(ctx: PipelineContext): Promise<void> {
  if (!ctx.files) {
    throw new Error("Scanner must run before processor");
  }

  const { config, files, tracker, logger } = ctx;

  // One registry for the whole run, so every snippet is defined once
  const snippets = new SnippetRegistry(
    ctx.knownSnippets,
    config.asciidoc.snippetExtension,
  );
  const converter = createConverter(config.asciidoc, snippets, (label, message) => {
    tracker.trackWarning(label, message);
    logger.debug(`${label}: ${message}`);
  });

  const convertedSnippets = new Map<string, string | undefined>();

  ctx.snippets = snippets;
  ctx.converter = converter;
  ctx.convertedSnippets = convertedSnippets;

  async function processFile(file: FileDescriptor): Promise<void> {
    let stage: "read" | "parse" | "write" = "read";

    try {
      const source = await readFile(file.inputPath, config.files.encoding);

      stage = "parse";
      const warningsBefore = tracker.getConversionIssues().length;
      const adoc = converter.convert(
        parseDocument(source),
        file.relativePath,
        file.inputPath,
      );
      file.warnings = tracker.getConversionIssues().length - warningsBefore;
      if (file.kind === "snippet") {
        convertedSnippets.set(file.inputPath, adoc);
      }

      stage = "write";
      if (!ctx.dryRun) {
        await mkdir(dirname(file.outputPath), { recursive: true });
        await writeFile(file.outputPath, adoc, "utf-8");
        file.written = true;
      }

      tracker.incrementSuccessful();
      logger.debug(`Converted ${file.relativePath} (${file.warnings} warnings)`);
    } catch (error) {
      // Only this document is lost, the run goes on
      tracker.trackError(file.relativePath, error, "file", stage);
      // A write failure keeps the converted content for the definitions
      if (file.kind === "snippet" && !convertedSnippets.has(file.inputPath)) {
        convertedSnippets.set(file.inputPath, undefined);
      }
      tracker.incrementFailed();
      logger.debug(`Failed ${file.relativePath}`);
    }
  }

  for (const file of files) {
    await processFile(file);
  }
}
