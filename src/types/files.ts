/**
 * File-related type definitions
 */

export type FileKind = "topic" | "snippet";

export interface FileDescriptor {
  // Scanner fills these fields:
  inputPath: string; // Absolute path to the Flare source file
  relativePath: string; // Relative path from input root
  outputPath: string; // Target AsciiDoc file path
  kind: FileKind; // Snippet files keep their own output for include:: directives

  // Processor fills these fields (after processing):
  warnings?: number; // Conversion warnings reported for this file
  written?: boolean; // True after file has been written to disk
}
