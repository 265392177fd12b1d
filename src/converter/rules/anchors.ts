/**
 * Rule: Anchors and links
 *
 * <a href> becomes a link: macro, <a name id/> an inline anchor.
 */

import type { Element } from "domhandler";
import type { ConversionRun, ConverterPlugin } from "../../types";
import { getAttribute } from "../../utils/dom";
import { escapeMacroText } from "../../utils/string";

function convertLink(href: string, node: Element, run: ConversionRun): string {
  const content = run.convertChildren(node);
  const text = content.trim() ? content : (getAttribute(node, "title") ?? "");
  return `link:${href}[${escapeMacroText(text)}]`;
}

function convertAnchor(node: Element, run: ConversionRun): string {
  const href = getAttribute(node, "href");
  if (href !== undefined) return convertLink(href, node, run);

  if (run.convertChildren(node).trim()) {
    run.warn("<a> without href has content, content dropped");
  }

  const name = getAttribute(node, "name");
  const id = getAttribute(node, "id");

  if (name === undefined) {
    run.warn("<a> without href has no name");
  } else if (id !== undefined && name !== id) {
    run.warn(`anchor name "${name}" does not match id "${id}"`);
  }

  if (id === undefined) {
    run.warn("<a> without href has no id, anchor dropped");
    return "";
  }

  return `[[${id}]]`;
}

export function anchorRules(): ConverterPlugin {
  return (converter) => {
    converter.addHandler("a", convertAnchor);
  };
}
