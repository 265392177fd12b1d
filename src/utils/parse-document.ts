import { load } from "cheerio";
import type { Document } from "domhandler";

/**
 * Parse a Flare topic or snippet (XHTML) into a domhandler tree.
 * XML mode keeps namespaced tags such as MadCap:xref and their case intact.
 */
export function parseDocument(source: string): Document {
  return load(source, { xml: true }).root()[0];
}
