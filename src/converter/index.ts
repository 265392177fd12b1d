/**
 * Converter Configuration
 * Sets up the converter with every rule for Flare content
 */

import { Converter } from "./converter";
import { SnippetRegistry } from "./snippet-registry";
import type { ConverterOptions, WarningSink } from "../types";
import {
  structureRules,
  headingRules,
  paragraphRules,
  divRules,
  listRules,
  imageRules,
  anchorRules,
  inlineRules,
  tableRules,
  figureRules,
  madcapRules,
} from "./rules";

export function createConverter(
  options: ConverterOptions,
  snippets: SnippetRegistry,
  sink: WarningSink,
): Converter {
  return new Converter(options, snippets, sink)
    .use(structureRules())
    .use(headingRules())
    .use(paragraphRules())
    .use(divRules())
    .use(listRules())
    .use(imageRules())
    .use(anchorRules())
    .use(inlineRules())
    .use(tableRules())
    .use(figureRules())
    .use(madcapRules());
}

export { Converter, handlerKey } from "./converter";
export { ConversionContext } from "./context";
export { SnippetRegistry, snippetName } from "./snippet-registry";
export type { SnippetEntry, SnippetLoader } from "./snippet-registry";
export { append } from "./assembler";
export { normalize } from "./normalize";
