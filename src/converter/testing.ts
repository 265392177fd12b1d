/**
 * Test helpers: convert an XHTML string with every rule and collect warnings
 */

import { createConverter } from "./index";
import { SnippetRegistry } from "./snippet-registry";
import { parseDocument } from "../utils/parse-document";
import type { Converter } from "./converter";
import type { ConverterOptions } from "../types";

export const TEST_OPTIONS: ConverterOptions = {
  extension: ".adoc",
  snippetExtension: ".flsnp",
};

export interface TestConverter {
  converter: Converter;
  snippets: SnippetRegistry;
  warnings: string[];
  labels: string[];
  convert(xml: string, documentPath?: string): string;
}

export function createTestConverter(known: string[] = []): TestConverter {
  const warnings: string[] = [];
  const labels: string[] = [];
  const snippets = new SnippetRegistry(new Set(known), TEST_OPTIONS.snippetExtension);
  const converter = createConverter(TEST_OPTIONS, snippets, (label, message) => {
    labels.push(label);
    warnings.push(message);
  });

  return {
    converter,
    snippets,
    warnings,
    labels,
    convert: (xml, documentPath) =>
      converter.convert(parseDocument(xml), "test.htm", documentPath),
  };
}

/**
 * Convert a single document, returning the output and the warnings it raised
 */
export function convertXml(xml: string): { output: string; warnings: string[] } {
  const { convert, warnings } = createTestConverter();
  return { output: convert(xml), warnings };
}
