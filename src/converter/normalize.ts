/**
 * Final whitespace cleanup, applied once per converted document
 */
export function normalize(text: string): string {
  return text
    .replace(/[ \t]+$/gm, "") // Trailing horizontal whitespace
    .replace(/\n{3,}/g, "\n\n") // Runs of blank lines
    .replace(/^\s+/, "")
    .replace(/\s*$/, "\n");
}
