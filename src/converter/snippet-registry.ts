/**
 * Snippet Registry
 * Shared by every document of a run: remembers which snippets were referenced
 * so their contents are converted once and emitted as attribute definitions.
 */

import { escapeMacroText } from "../utils/string";

export interface SnippetEntry {
  path: string;
  name: string;
  content?: string;
}

export interface SnippetName {
  name: string;
  // False when the path does not end with the snippet extension
  matched: boolean;
}

/**
 * Converts the snippet file at entry.path; undefined leaves the entry empty
 */
export type SnippetLoader = (entry: SnippetEntry) => Promise<string | undefined>;

/**
 * Derive the attribute name of a snippet from its path
 *
 * @example
 * snippetName("../Resources/Snippets/Legal.flsnp", ".flsnp") // { name: "Legal", matched: true }
 * snippetName("Snippets/Copyright Notice.flsnp", ".flsnp") // { name: "Copyright-Notice", matched: true }
 */
export function snippetName(path: string, extension: string): SnippetName {
  const base = path.split(/[\\/]/).pop() ?? path;
  const matched =
    base.length > extension.length &&
    base.toLowerCase().endsWith(extension.toLowerCase());
  const stem = matched
    ? base.slice(0, -extension.length)
    : base.replace(/\.[^.]*$/, "");

  // Attribute names only take word characters and hyphens
  return { name: stem.replace(/[^A-Za-z0-9_-]/g, "-"), matched };
}

export class SnippetRegistry {
  private entries = new Map<string, SnippetEntry>();

  constructor(
    private readonly known: ReadonlySet<string> = new Set(),
    private readonly extension = ".flsnp",
  ) {}

  nameOf(path: string): SnippetName {
    return snippetName(path, this.extension);
  }

  /**
   * Record a reference to the snippet at path and return its attribute name.
   * Known names are never recorded; a path is recorded at most once.
   */
  register(path: string): string {
    const existing = this.entries.get(path);
    if (existing) return existing.name;

    const { name } = this.nameOf(path);
    if (!this.known.has(name)) {
      this.entries.set(path, { path, name });
    }
    return name;
  }

  list(): SnippetEntry[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Populate every entry that has no content yet, in insertion order.
   * Entries registered while loading (nested snippets) are visited too.
   */
  async load(loader: SnippetLoader): Promise<void> {
    for (const entry of this.entries.values()) {
      if (entry.content !== undefined) continue;
      entry.content = await loader(entry);
    }
  }

  /**
   * One attribute definition line per loaded snippet, in insertion order.
   * pass:q[] keeps inline formatting working where the attribute is used.
   */
  definitions(): string {
    const lines: string[] = [];

    for (const { name, content } of this.entries.values()) {
      if (content === undefined) continue;
      const value = escapeMacroText(content.trim()).replace(/\n+/g, " \\\n");
      lines.push(`:${name}: pass:q[${value}]`);
    }

    return lines.length > 0 ? lines.join("\n") + "\n" : "";
  }
}
