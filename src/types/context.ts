/**
 * Pipeline context - flows through the entire run
 * Each module reads what it needs and writes its results back
 */

import type { ConversionConfig } from "./config";
import type { FileDescriptor } from "./files";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { Converter } from "../converter/converter";
import type { SnippetRegistry } from "../converter/snippet-registry";

// ============================================================================
// Issues
// ============================================================================

// Type-safe reasons for each issue type
export type FileIssueReason = "parse-error" | "read-error" | "write-error";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

// Discriminated union - each type has its own subset of reasons
export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

// Recoverable problem reported by the converter (unsupported tag, missing src, ...)
export interface ConversionIssue {
  type: "conversion";
  path: string;
  message: string;
}

export type Issue = FileIssue | ResourceIssue | ConversionIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  // File counts
  totalFiles: number;
  successfulFiles: number;
  failedFiles: number;

  // Snippet counts
  definedSnippets: number;
  knownSnippets: number;

  // Recoverable conversion warnings
  warnings: number;

  // All issues
  issues: Issue[];

  // Timing
  duration: number;
}

export interface ConfigError {
  path: string;
  error: unknown;
}

// ============================================================================
// Pipeline Context
// ============================================================================

export interface PipelineContext {
  // Input - provided at initialization
  config: ConversionConfig;

  // Unified tracking for stats and issues
  tracker: Tracker;
  logger: Logger;

  // Snippet names defined outside this run
  knownSnippets: Set<string>;

  dryRun?: boolean;
  verbose?: boolean;

  files?: FileDescriptor[]; // Written by scanner
  converter?: Converter; // Written by processor
  snippets?: SnippetRegistry; // Written by processor, shared by every document

  // Written by processor: output of every scanned snippet file by input path,
  // undefined when it failed, so the snippets module never converts it again
  convertedSnippets?: Map<string, string | undefined>;
}
