/**
 * Rule: Images
 *
 * An image right after a paragraph boundary is a block image (image::),
 * anywhere else it is inline (image:). Only the base name is kept, the
 * directory is expected to be set once through :imagesdir:.
 */

import path from "node:path";
import type { Element } from "domhandler";
import type { ConversionRun, ConverterPlugin } from "../../types";
import { escapeMacroText } from "../../utils/string";

const XHTML_NAMESPACE = "http://www.w3.org/1999/xhtml";

// Both are what AsciiDoc does anyway
const DEFAULT_ALIGNMENTS = new Set(["middle", "top"]);

/**
 * Remember the first image directory and report any that differs
 */
function checkDirectory(src: string, run: ConversionRun): void {
  const directory = path.posix.dirname(src);
  const expected = run.state.imageDirectory;

  if (expected === undefined) {
    run.state.imageDirectory = directory;
  } else if (expected.toLowerCase() !== directory.toLowerCase()) {
    run.warn(`image directory "${directory}" differs from "${expected}"`);
  }
}

function convertImage(node: Element, run: ConversionRun): string {
  let target: string | undefined;
  let title = "";

  for (const [name, value] of Object.entries(node.attribs)) {
    switch (name.toLowerCase()) {
      case "src":
        checkDirectory(value, run);
        target = path.posix.basename(value);
        break;
      case "alt":
        title = escapeMacroText(value);
        break;
      case "style":
      case "madcap:mediastyle":
        break;
      case "align":
        if (!DEFAULT_ALIGNMENTS.has(value)) {
          run.warn(`unsupported image alignment: ${value}`);
        }
        break;
      case "xmlns":
        if (value !== "" && value !== XHTML_NAMESPACE) {
          run.warn(`unsupported namespace on <img>: ${value}`);
        }
        break;
      default:
        run.warn(`unsupported <img> attribute ${name}="${value}"`);
    }
  }

  if (!target) {
    run.warn("<img> without src");
    return "";
  }

  return run.state.atParagraphStart
    ? `\nimage::${target}[${title}]\n`
    : `image:${target}[${title}]`;
}

export function imageRules(): ConverterPlugin {
  return (converter) => {
    converter.addHandler("img", convertImage);
  };
}
