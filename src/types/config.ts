/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const FilesConfigSchema = z.object({
  patterns: z.array(z.string()).min(1),
  ignore: z.array(z.string()),
  encoding: z.enum(["utf-8", "utf8", "utf16le", "latin1", "ascii"]),
});

export const AsciidocConfigSchema = z.object({
  // Extension of converted documents, used for output files and xref targets
  extension: z.string().startsWith("."),
  // Extension of Flare snippet files (stripped to derive snippet names)
  snippetExtension: z.string().startsWith("."),
});

export const SnippetsConfigSchema = z.object({
  // Written to the output directory, one attribute definition per snippet
  definitionsFile: z.string(),
  // Snippet names already defined elsewhere (never converted again)
  known: z.array(z.string()),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const ConversionConfigSchema = z.object({
  input: z.string(),
  output: z.string(),
  files: FilesConfigSchema,
  asciidoc: AsciidocConfigSchema,
  snippets: SnippetsConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = ConversionConfigSchema.partial()
  .extend({
    files: FilesConfigSchema.partial().optional(),
    asciidoc: AsciidocConfigSchema.partial().optional(),
    snippets: SnippetsConfigSchema.partial().optional(),
    logging: LoggingConfigSchema.partial().optional(),
  });

// Infer TypeScript types from Zod schemas
export type FilesConfig = z.infer<typeof FilesConfigSchema>;
export type AsciidocConfig = z.infer<typeof AsciidocConfigSchema>;
export type SnippetsConfig = z.infer<typeof SnippetsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;
