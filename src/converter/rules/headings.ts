/**
 * Rule: Headings
 *
 * AsciiDoc reserves a single "=" for the document title, so h1 becomes "=="
 * and h6 shares the deepest level (five) with h5.
 */

import type { Element } from "domhandler";
import type { ConversionRun, ConverterPlugin } from "../../types";

const MAX_LEVEL = 5;

// Anchors inside a title are ignored by AsciiDoc tooling
const LEADING_ANCHOR = /^(\[\[[^\]]+\]\])\s*/;

export function headingMarker(level: number): string {
  return "=".repeat(Math.min(level, MAX_LEVEL) + 1);
}

function convertHeading(level: number, node: Element, run: ConversionRun): string {
  let text = run.convertChildren(node).replace(/\n/g, " ").trim();

  let anchor = "";
  const match = LEADING_ANCHOR.exec(text);
  if (match) {
    anchor = `${match[1]}\n`;
    text = text.slice(match[0].length);
  }

  return `\n${anchor}${headingMarker(level)} ${text}\n`;
}

export function headingRules(): ConverterPlugin {
  return (converter) => {
    for (let level = 1; level <= 6; level++) {
      converter.addHandler(`h${level}`, (node, run) =>
        convertHeading(level, node, run),
      );
    }
  };
}
