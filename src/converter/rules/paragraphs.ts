/**
 * Rule: Paragraphs
 *
 * Handles admonition classes, roles and the small subset of inline CSS that
 * Flare writes on paragraphs.
 */

import type { Element } from "domhandler";
import type { ConversionRun, ConverterPlugin } from "../../types";
import { classRoles, parseStyle, wrapInline } from "../../utils/string";

export const ADMONITIONS: Record<string, string> = {
  note: "NOTE",
  important: "IMPORTANT",
  tip: "TIP",
};

interface ParagraphStyle {
  roles: string[];
  admonition?: string;
  italic: boolean;
  bold: boolean;
}

function applyStyle(style: string, result: ParagraphStyle, run: ConversionRun): void {
  for (const { property, value } of parseStyle(style)) {
    switch (property) {
      case "text-align":
        result.roles.push(`text-${value}`);
        break;
      case "font-style":
        if (value === "italic") {
          result.italic = true;
        } else if (value !== "normal") {
          run.warn(`unsupported font-style: ${value}`);
        }
        break;
      case "font-weight":
        if (value === "bold") {
          result.bold = true;
        } else {
          run.warn(`unsupported font-weight: ${value}`);
        }
        break;
      default:
        run.warn(`unsupported CSS property on <p>: ${property}`);
    }
  }
}

function readAttributes(node: Element, run: ConversionRun): ParagraphStyle {
  const result: ParagraphStyle = { roles: [], italic: false, bold: false };

  for (const [name, value] of Object.entries(node.attribs)) {
    if (name === "class") {
      const admonition = ADMONITIONS[value.trim().toLowerCase()];
      if (admonition) {
        result.admonition = admonition;
      } else if (value.trim()) {
        result.roles.push(classRoles(value));
      }
    } else if (name === "style") {
      applyStyle(value, result, run);
    } else if (name === "id" || name === "xmlns" || name.includes(":")) {
      continue;
    } else {
      run.warn(`unsupported <p> attribute ${name}="${value}"`);
    }
  }

  return result;
}

function convertParagraph(node: Element, run: ConversionRun): string {
  const style = readAttributes(node, run);

  let content = run.convertChildren(node);
  if (style.italic) content = wrapInline(content, "_");
  if (style.bold) content = wrapInline(content, "*");

  const annotation =
    style.roles.length > 0 ? `[.${style.roles.join(".")}]\n` : "";
  const prefix = style.admonition ? `[${style.admonition}]\n====\n` : "";
  const suffix = style.admonition ? "\n====" : "";

  return `${annotation}${prefix}${content}${suffix}\n`;
}

export function paragraphRules(): ConverterPlugin {
  return (converter) => {
    converter.addHandler("p", convertParagraph);
  };
}
