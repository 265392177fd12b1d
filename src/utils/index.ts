/**
 * Utility exports
 */

// DOM utilities
export { getAttribute, textContent } from "./dom";
export { parseDocument } from "./parse-document";

// String utilities
export {
  attributeName,
  conditionName,
  parseStyle,
  collapseBlankLines,
  wrapInline,
  escapeMacroText,
  classRoles,
  replaceExtension,
} from "./string";
export type { StyleDeclaration } from "./string";

// Filesystem utilities
export { isFile } from "./is-file";
export { loadKnownSnippets, parseKnownSnippets } from "./load-known-snippets";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";

// Classes
export { Tracker } from "./tracker";
export { Logger } from "./logger";
export type { LogLevel } from "./logger";
