/**
 * Rule: Document structure and plain block elements
 */

import type { ConverterPlugin } from "../../types";
import { textContent } from "../../utils/dom";

export function structureRules(): ConverterPlugin {
  return (converter) => {
    // Only the body carries content
    converter.addHandler("html", (node, run) => run.convertChildren(node));
    converter.addHandler("head", () => "");
    converter.addHandler("body", (node, run) => run.convertChildren(node));

    converter.addHandler("br", () => " +\n");
    converter.addHandler("hr", () => "\n'''\n");

    converter.addHandler("blockquote", (node, run) =>
      `\n____\n${run.convertChildren(node).trim()}\n____\n`,
    );

    // Literal block, markup inside is not interpreted
    converter.addHandler("pre", (node) =>
      `\n....\n${textContent(node).replace(/^\n/, "").trimEnd()}\n....\n`,
    );
  };
}
