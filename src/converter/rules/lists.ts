/**
 * Rule: Lists and definition lists
 *
 * List items must start on the marker line and cannot contain blank lines,
 * so multi-block items are attached with a "+" continuation and an open block.
 */

import type { Element } from "domhandler";
import type { ConversionRun, ConverterPlugin } from "../../types";

export const UNORDERED_MARKER = "*";
export const ORDERED_MARKER = ".";

const BLANK_LINE = /\n[ \t]*\n/;

/**
 * Marker for a list nested in the current one: the same kind goes one level deeper
 */
function nestedMarker(symbol: string, outer: string | undefined): string {
  if (outer && outer.startsWith(symbol)) return outer + symbol;
  return symbol;
}

function convertList(symbol: string, node: Element, run: ConversionRun): string {
  const marker = nestedMarker(symbol, run.state.listMarker);
  const items = run.state.scoped("listMarker", marker, () =>
    run.convertChildren(node),
  );
  // A nested list must not continue the text of its parent item
  return `\n${items}`;
}

function convertListItem(node: Element, run: ConversionRun): string {
  let marker = run.state.listMarker;
  if (!marker) {
    run.warn("<li> outside of a list");
    marker = UNORDERED_MARKER;
  }

  const content = run.convertChildren(node).trim();
  const blank = BLANK_LINE.exec(content);
  if (!blank) return `${marker} ${content}\n`;

  const first = content.slice(0, blank.index);
  const rest = content.slice(blank.index + blank[0].length).trim();
  return `${marker} ${first}\n+\n--\n${rest}\n--\n`;
}

export function listRules(): ConverterPlugin {
  return (converter) => {
    converter.addHandler("ul", (node, run) =>
      convertList(UNORDERED_MARKER, node, run),
    );
    converter.addHandler("ol", (node, run) =>
      convertList(ORDERED_MARKER, node, run),
    );
    converter.addHandler("li", convertListItem);

    // Definition lists
    converter.addHandler("dl", (node, run) => `\n${run.convertChildren(node)}\n`);
    converter.addHandler("dt", (node, run) => `${run.convertChildren(node).trim()}::`);
    converter.addHandler("dd", (node, run) => `  ${run.convertChildren(node).trim()}\n`);
  };
}
