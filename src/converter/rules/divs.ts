/**
 * Rule: Divs
 *
 * Flare marks conditional content with MadCap:conditions; it becomes an
 * ifdef::[] / endif::[] pair so the condition can be set at build time.
 */

import type { Element } from "domhandler";
import type { ConversionRun, ConverterPlugin } from "../../types";
import { conditionName } from "../../utils/string";

export const CONDITIONS_ATTRIBUTE = "madcap:conditions";

function convertDiv(node: Element, run: ConversionRun): string {
  let condition: string | undefined;

  for (const [name, value] of Object.entries(node.attribs)) {
    if (name.toLowerCase() === CONDITIONS_ATTRIBUTE) {
      condition = conditionName(value) || undefined;
    } else if (name === "style") {
      run.warn(`unsupported style on <div>: ${value}`);
    } else {
      run.warn(`ignoring <div> attribute ${name}="${value}"`);
    }
  }

  const content = run.convertChildren(node);
  if (!condition) return content;

  return `\nifdef::${condition}[]\n${content}\nendif::${condition}[]\n`;
}

export function divRules(): ConverterPlugin {
  return (converter) => {
    converter.addHandler("div", convertDiv);
  };
}
