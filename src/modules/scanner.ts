/**
 * Scanner Module
 * Discovers Flare topic and snippet files and plans their output paths
 */

import glob from "fast-glob";
import path from "node:path";
import type { PipelineContext, FileDescriptor, FileKind } from "../types";

/**
 * Output path mirrors the input layout, with the AsciiDoc extension
 */
function outputPathFor(
  relativePath: string,
  outputDir: string,
  extension: string,
): string {
  const withoutExtension = relativePath.slice(
    0,
    relativePath.length - path.extname(relativePath).length,
  );
  return path.join(outputDir, `${withoutExtension}${extension}`);
}

/**
 * Scans input directory for Flare files and populates context
 *
 * Writes to context:
 * - files: All files (flat list), topics and snippets sorted by path
 */
export async function scan(ctx: PipelineContext): Promise<void> {
  const { config, tracker } = ctx;
  const inputDir = path.resolve(config.input);
  const outputDir = path.resolve(config.output);

  const sourceFiles = await glob(config.files.patterns, {
    cwd: inputDir,
    absolute: true,
    onlyFiles: true,
    ignore: config.files.ignore,
  });

  const files: FileDescriptor[] = sourceFiles
    .sort((a, b) => a.localeCompare(b))
    .map((inputPath) => {
      const relativePath = path.relative(inputDir, inputPath);
      const kind: FileKind = relativePath
        .toLowerCase()
        .endsWith(config.asciidoc.snippetExtension.toLowerCase())
        ? "snippet"
        : "topic";

      return {
        inputPath,
        relativePath,
        outputPath: outputPathFor(
          relativePath,
          outputDir,
          config.asciidoc.extension,
        ),
        kind,
      };
    });

  ctx.files = files;
  tracker.setTotalFiles(files.length);
  ctx.logger.debug(`Found ${files.length} files in ${inputDir}`);
}
