/**
 * Converter
 * Tag-dispatch conversion of a Flare document tree into AsciiDoc
 */

import {
  isCDATA,
  isComment,
  isDirective,
  isTag,
  isText,
  type Element,
  type ParentNode,
} from "domhandler";
import { ConversionContext } from "./context";
import { append } from "./assembler";
import { normalize } from "./normalize";
import { textContent } from "../utils/dom";
import type { SnippetRegistry } from "./snippet-registry";
import type {
  ConversionRun,
  ConverterOptions,
  ConverterPlugin,
  TagHandler,
  WarningSink,
} from "../types";

// Tags after which the next content starts a new paragraph
const PARAGRAPH_TAGS = new Set(["br", "p"]);

/**
 * Uniform lookup key for plain and namespaced tags (MadCap:xref -> madcap_xref)
 */
export function handlerKey(tag: string): string {
  return tag.replace(":", "_").toLowerCase();
}

/**
 * Unindent source text and substitute the non-breaking space
 */
function cleanText(data: string): string {
  return data
    .replace(/\n[ \t]+/g, "\n")
    .replace(/\u00a0|&nbsp;/g, "{nbsp}");
}

export class Converter {
  private handlers = new Map<string, TagHandler>();

  constructor(
    readonly options: ConverterOptions,
    readonly snippets: SnippetRegistry,
    private readonly sink: WarningSink,
  ) {}

  use(plugin: ConverterPlugin): this {
    plugin(this);
    return this;
  }

  addHandler(tag: string, handler: TagHandler): this {
    this.handlers.set(handlerKey(tag), handler);
    return this;
  }

  handlerFor(tag: string): TagHandler | undefined {
    return this.handlers.get(handlerKey(tag));
  }

  supportedTags(): string[] {
    return [...this.handlers.keys()].sort();
  }

  /**
   * Convert one document with a fresh context
   *
   * @param label - Shown in warnings (usually the relative file path)
   * @param documentPath - Source path, snippet references resolve against its directory
   */
  convert(root: ParentNode, label: string, documentPath?: string): string {
    const run = new DocumentRun(
      this,
      new ConversionContext(label, documentPath),
      this.sink,
    );
    return normalize(run.convertChildren(root));
  }
}

class DocumentRun implements ConversionRun {
  readonly snippets: SnippetRegistry;
  readonly options: ConverterOptions;

  constructor(
    private readonly converter: Converter,
    readonly state: ConversionContext,
    private readonly sink: WarningSink,
  ) {
    this.snippets = converter.snippets;
    this.options = converter.options;
  }

  warn(message: string): void {
    this.sink(this.state.label, message);
  }

  convertChildren(node: ParentNode, skipBlankText = false): string {
    let result = "";

    for (const child of node.children) {
      if (isTag(child)) {
        result = this.convertElement(child, result);
      } else if (isText(child)) {
        const text = cleanText(child.data);
        if (text.trim() !== "") {
          this.state.atParagraphStart = false;
        } else if (text === "\n" && skipBlankText) {
          continue;
        }
        result += text;
      } else if (isComment(child)) {
        const text = child.data.trim();
        result += text.includes("\n")
          ? `\n////\n${text}\n////\n`
          : `\n// ${text}\n`;
      } else if (isCDATA(child)) {
        if (textContent(child).trim() !== "") {
          this.warn("CDATA section has no AsciiDoc equivalent, dropped");
        }
      } else if (isDirective(child)) {
        // <?xml ... ?> declaration
        continue;
      } else {
        this.warn(`unsupported node type ${child.type}`);
      }
    }

    return result;
  }

  private convertElement(node: Element, result: string): string {
    const handler = this.converter.handlerFor(node.name);
    if (!handler) {
      this.warn(`unsupported tag <${node.name}>`);
      return result;
    }

    const converted = append(result, handler(node, this));
    this.state.atParagraphStart = PARAGRAPH_TAGS.has(handlerKey(node.name));
    return converted;
  }
}
