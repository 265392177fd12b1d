/**
 * String Utilities
 * Shared string manipulation helper functions
 */

/**
 * AsciiDoc attribute names cannot contain dots
 *
 * @example
 * attributeName("General.ProductName") // "General-ProductName"
 */
export function attributeName(name: string): string {
  return name.trim().replace(/\./g, "-");
}

/**
 * Convert a Flare condition expression into an ifdef:: attribute list
 *
 * @example
 * conditionName("Default.PrintOnly") // "Default-PrintOnly"
 * conditionName("Default.Web, Default.Beta") // "Default-Web,Default-Beta"
 */
export function conditionName(conditions: string): string {
  return conditions
    .split(",")
    .map((condition) => attributeName(condition))
    .filter((condition) => condition.length > 0)
    .join(",");
}

export interface StyleDeclaration {
  property: string;
  value: string;
}

/**
 * Parse a minimal inline CSS declaration list ("prop: value; prop: value")
 */
export function parseStyle(style: string): StyleDeclaration[] {
  const declarations: StyleDeclaration[] = [];

  for (const part of style.split(";")) {
    const colon = part.indexOf(":");
    if (colon === -1) continue;

    const property = part.slice(0, colon).trim().toLowerCase();
    const value = part.slice(colon + 1).trim();
    if (property) declarations.push({ property, value });
  }

  return declarations;
}

/**
 * Collapse blank-line runs, inline markup cannot span a paragraph break
 */
export function collapseBlankLines(text: string): string {
  return text.replace(/\n[ \t]*(?:\n[ \t]*)+/g, "\n");
}

/**
 * Wrap text in an inline delimiter pair, optionally preceded by a role.
 * Surrounding whitespace stays outside the delimiters.
 *
 * @example
 * wrapInline(" bold ", "*") // " *bold* "
 * wrapInline("x", "`", "code") // "[.code]`x`"
 */
export function wrapInline(
  text: string,
  delimiter: string,
  role?: string,
): string {
  const collapsed = collapseBlankLines(text);
  const core = collapsed.trim();
  if (!core) return collapsed;

  const leading = collapsed.slice(0, collapsed.length - collapsed.trimStart().length);
  const trailing = collapsed.slice(collapsed.trimEnd().length);
  const prefix = role ? `[.${role}]` : "";

  return `${leading}${prefix}${delimiter}${core}${delimiter}${trailing}`;
}

/**
 * Text placed inside a macro's brackets cannot hold an unescaped "]"
 *
 * @example
 * escapeMacroText("a]b") // "a\\]b"
 */
export function escapeMacroText(text: string): string {
  return text.replace(/]/g, "\\]");
}

/**
 * Turn a class attribute into a role list ("a b" -> "a.b")
 */
export function classRoles(className: string): string {
  return className.trim().split(/\s+/).join(".");
}

/**
 * Swap a trailing file extension (case-insensitive), other paths are returned unchanged
 *
 * @example
 * replaceExtension("Snippets/Legal.flsnp", ".flsnp", ".adoc") // "Snippets/Legal.adoc"
 */
export function replaceExtension(file: string, from: string, to: string): string {
  if (!file.toLowerCase().endsWith(from.toLowerCase())) return file;
  return file.slice(0, file.length - from.length) + to;
}
