/**
 * Rule: Tables
 *
 * Header detection accumulates over the whole table: any <th> sets the
 * "header" option, rendered as [%header] above the |=== block.
 * Column widths (<col>) are not carried over yet.
 */

import type { Element } from "domhandler";
import type { ConversionRun, ConverterPlugin } from "../../types";
import type { CaptionSlot } from "../context";
import { getAttribute } from "../../utils/dom";

const TABLE_DELIMITER = "|===";

// ============================================================================
// Cell Spec
// ============================================================================

function getSpan(node: Element, name: "colspan" | "rowspan"): number {
  const span = parseInt(getAttribute(node, name) ?? "1", 10);
  return Number.isNaN(span) || span < 1 ? 1 : span;
}

/**
 * Cell spec in front of the "|": spans ("2+", ".3+", "2.3+") and the
 * AsciiDoc style ("a") when the cell holds several blocks
 */
export function cellSpec(colspan: number, rowspan: number, blocks: boolean): string {
  let spec = "";
  if (colspan > 1 || rowspan > 1) {
    spec += colspan > 1 ? String(colspan) : "";
    spec += rowspan > 1 ? `.${rowspan}` : "";
    spec += "+";
  }
  if (blocks) spec += "a";
  return spec;
}

// ============================================================================
// Handlers
// ============================================================================

function convertTable(node: Element, run: ConversionRun): string {
  const options: Record<string, boolean> = {};
  const caption: CaptionSlot = {};

  const body = run.state.scoped("tableOptions", options, () =>
    run.state.scoped("tableCaption", caption, () => run.convertChildren(node)),
  );

  const flags = Object.entries(options)
    .filter(([, enabled]) => enabled)
    .map(([flag]) => `%${flag}`);

  const title = caption.value ? `.${caption.value}\n` : "";
  const attributes = flags.length > 0 ? `[${flags.join(",")}]\n` : "";

  return `\n${title}${attributes}${TABLE_DELIMITER}\n${body.trim()}\n${TABLE_DELIMITER}\n`;
}

function convertCell(node: Element, run: ConversionRun): string {
  const content = run.convertChildren(node).trimEnd();
  const spec = cellSpec(
    getSpan(node, "colspan"),
    getSpan(node, "rowspan"),
    /\n[ \t]*\n/.test(content),
  );
  return `${spec}|${content}`;
}

function convertHeaderCell(node: Element, run: ConversionRun): string {
  if (run.state.tableOptions) {
    run.state.tableOptions.header = true;
  } else {
    run.warn("<th> outside of a table");
  }
  return convertCell(node, run);
}

function convertCaption(node: Element, run: ConversionRun): string {
  const slot = run.state.tableCaption;
  if (!slot) {
    run.warn("<caption> outside of a table, dropped");
  } else if (slot.value !== undefined) {
    run.warn("second <caption> in a table, dropped");
  } else {
    slot.value = run.convertChildren(node).replace(/\s+/g, " ").trim();
  }
  return "";
}

export function tableRules(): ConverterPlugin {
  return (converter) => {
    converter.addHandler("table", convertTable);
    converter.addHandler("caption", convertCaption);

    // Only cells produce output, whitespace between them is dropped
    converter.addHandler("tr", (node, run) => `${run.convertChildren(node, true)}\n`);
    converter.addHandler("td", convertCell);
    converter.addHandler("th", convertHeaderCell);

    // Wrappers pass their children through
    for (const tag of ["thead", "tbody", "tfoot", "colgroup", "col"]) {
      converter.addHandler(tag, (node, run) => run.convertChildren(node));
    }
  };
}
