/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  FilesConfig,
  AsciidocConfig,
  SnippetsConfig,
  LoggingConfig,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "./config";

// Files
export type { FileDescriptor, FileKind } from "./files";

// Context
export type {
  PipelineContext,
  ConfigError,
  Issue,
  IssueType,
  FileIssue,
  ResourceIssue,
  ConversionIssue,
  FileIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "./context";

// Converter
export type {
  WarningSink,
  ConverterOptions,
  ConversionRun,
  TagHandler,
  ConverterPlugin,
} from "./converter";
