/**
 * Rule: MadCap elements
 *
 * Cross-references, snippets, variables, page breaks, equations, index
 * keywords and inline conditional text.
 */

import path from "node:path";
import type { Element } from "domhandler";
import type { ConversionRun, ConverterPlugin } from "../../types";
import { getAttribute, textContent } from "../../utils/dom";
import {
  attributeName,
  conditionName,
  escapeMacroText,
  replaceExtension,
} from "../../utils/string";
import { CONDITIONS_ATTRIBUTE } from "./divs";

// ============================================================================
// Cross-references
// ============================================================================

// Topic extension, at the end of the href or right before the fragment
const TOPIC_EXTENSION = /\.html?(?=#|$)/i;

// Print outputs append the page number to the generated xref text
const PAGE_REFERENCE = /\s*on\s+page(?:\s|\{nbsp\})*\d*$/i;

/**
 * Title used when the xref text is empty.
 * Without a fragment AsciiDoc falls back to the target's own title.
 */
export function defaultXrefTitle(href: string): string {
  const hash = href.indexOf("#");
  return hash === -1 ? "" : `see ${href.slice(hash + 1)}`;
}

function convertXref(node: Element, run: ConversionRun): string {
  const content = run.convertChildren(node);
  const href = getAttribute(node, "href");
  if (href === undefined) {
    run.warn("MadCap:xref without href");
    return content;
  }

  const target = href.replace(TOPIC_EXTENSION, run.options.extension);
  const title = content
    .replace(/\n/g, " ")
    .replace(PAGE_REFERENCE, "")
    .trim()
    .replace(/^["“]/, "")
    .replace(/["”]$/, "");

  return `xref:${target}[${escapeMacroText(title || defaultXrefTitle(href))}]`;
}

// ============================================================================
// Snippets
// ============================================================================

/**
 * Snippet references are relative to the referencing document
 */
function resolveSnippetPath(src: string, documentPath?: string): string {
  return documentPath ? path.join(path.dirname(documentPath), src) : src;
}

function readSnippetSource(node: Element, run: ConversionRun, tag: string): string | undefined {
  if (node.children.length > 0) {
    run.warn(`${tag} is not empty, content dropped`);
  }

  const src = getAttribute(node, "src");
  if (src === undefined) {
    run.warn(`${tag} without src`);
  }
  return src;
}

function convertSnippetText(node: Element, run: ConversionRun): string {
  const src = readSnippetSource(node, run, "MadCap:snippetText");
  if (src === undefined) return "";

  if (!run.snippets.nameOf(src).matched) {
    run.warn(`snippet path "${src}" does not end with ${run.options.snippetExtension}`);
  }

  const name = run.snippets.register(resolveSnippetPath(src, run.state.documentPath));
  return `{${name}}`;
}

function convertSnippetBlock(node: Element, run: ConversionRun): string {
  const src = readSnippetSource(node, run, "MadCap:snippetBlock");
  if (src === undefined) return "";

  const target = replaceExtension(src, run.options.snippetExtension, run.options.extension);
  return `\ninclude::${target}[]\n`;
}

// ============================================================================
// Variables, breaks, equations
// ============================================================================

function convertVariable(node: Element, run: ConversionRun): string {
  const name = getAttribute(node, "name");
  if (name === undefined) {
    run.warn("MadCap:variable without name");
    return "";
  }
  return `{${attributeName(name)}}`;
}

function convertEquation(node: Element): string {
  const formula = textContent(node).trim().replace(/^\$|\$$/g, "");
  return `stem:[${escapeMacroText(formula)}]`;
}

// ============================================================================
// Index keywords and conditional text
// ============================================================================

/**
 * term="Install;Setup:Linux" -> one concealed index term per entry,
 * ":" separating the levels
 */
function convertKeyword(node: Element, run: ConversionRun): string {
  const term = getAttribute(node, "term");
  if (term === undefined) {
    run.warn("MadCap:keyword without term");
    return "";
  }

  return term
    .split(";")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const levels = entry.split(":").map((level) => escapeMacroText(level.trim()));
      return `indexterm:[${levels.join(",")}]`;
    })
    .join("");
}

function convertConditionalText(node: Element, run: ConversionRun): string {
  const content = run.convertChildren(node);
  const conditions = Object.entries(node.attribs).find(
    ([name]) => name.toLowerCase() === CONDITIONS_ATTRIBUTE,
  );
  const condition = conditions ? conditionName(conditions[1]) : "";
  if (!condition) return content;

  // The single-line form of ifdef cannot span lines
  return `ifdef::${condition}[${content.replace(/\s*\n\s*/g, " ")}]`;
}

export function madcapRules(): ConverterPlugin {
  return (converter) => {
    converter.addHandler("MadCap:xref", convertXref);
    converter.addHandler("MadCap:snippetText", convertSnippetText);
    converter.addHandler("MadCap:snippetBlock", convertSnippetBlock);
    converter.addHandler("MadCap:variable", convertVariable);
    converter.addHandler("MadCap:pageBreak", () => "\n<<<\n");
    converter.addHandler("MadCap:equation", convertEquation);
    converter.addHandler("MadCap:keyword", convertKeyword);
    converter.addHandler("MadCap:conditionalText", convertConditionalText);
  };
}
