/**
 * Known Snippets
 * Snippet names already defined by an existing AsciiDoc attributes file
 */

import { readFile } from "fs/promises";

// ":name: value" attribute entries, unset entries (":name!:") excluded
const ATTRIBUTE_ENTRY = /^:([A-Za-z0-9_][A-Za-z0-9_-]*):/gm;

export function parseKnownSnippets(content: string): string[] {
  return [...content.matchAll(ATTRIBUTE_ENTRY)].map((match) => match[1]);
}

export async function loadKnownSnippets(path: string): Promise<string[]> {
  const content = await readFile(path, "utf-8");
  return parseKnownSnippets(content);
}
