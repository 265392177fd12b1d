/**
 * DOM Utilities
 * Read-only helpers over domhandler nodes
 */

import { hasChildren, isText, type AnyNode, type Element } from "domhandler";

/**
 * Get an attribute value, undefined when the attribute is absent
 */
export function getAttribute(node: Element, name: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(node.attribs, name)
    ? node.attribs[name]
    : undefined;
}

/**
 * Concatenated text of a node and all its descendants
 */
export function textContent(node: AnyNode): string {
  if (isText(node)) return node.data;
  if (!hasChildren(node)) return "";

  let result = "";
  for (const child of node.children) {
    result += textContent(child);
  }
  return result;
}
