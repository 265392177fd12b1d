/**
 * Converter-related types
 */

import type { Element, ParentNode } from "domhandler";
import type { AsciidocConfig } from "./config";
import type { ConversionContext } from "../converter/context";
import type { SnippetRegistry } from "../converter/snippet-registry";
import type { Converter } from "../converter/converter";

/**
 * Receives recoverable problems; never affects control flow
 */
export type WarningSink = (label: string, message: string) => void;

export type ConverterOptions = AsciidocConfig;

/**
 * What a tag handler sees of the document being converted
 */
export interface ConversionRun {
  readonly state: ConversionContext;
  readonly snippets: SnippetRegistry;
  readonly options: ConverterOptions;
  convertChildren(node: ParentNode, skipBlankText?: boolean): string;
  warn(message: string): void;
}

export type TagHandler = (node: Element, run: ConversionRun) => string;

/**
 * A rule module registers its handlers on the converter
 */
export type ConverterPlugin = (converter: Converter) => void;
