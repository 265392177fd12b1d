/**
 * Rule: Inline styles
 */

import type { ConverterPlugin } from "../../types";
import { getAttribute } from "../../utils/dom";
import { classRoles, wrapInline } from "../../utils/string";

const STRONG = "*";
const EMPHASIS = "_";
const MONOSPACE = "`";

// Tags that map to a plain delimiter pair
const DELIMITERS: Record<string, string> = {
  b: STRONG,
  strong: STRONG,
  i: EMPHASIS,
  em: EMPHASIS,
  q: MONOSPACE,
  tt: MONOSPACE,
  sup: "^",
  sub: "~",
};

// Tags that map to a fixed role
const ROLES: Record<string, string> = {
  code: "code",
  small: "small",
  u: "underline",
};

export function inlineRules(): ConverterPlugin {
  return (converter) => {
    for (const [tag, delimiter] of Object.entries(DELIMITERS)) {
      converter.addHandler(tag, (node, run) =>
        wrapInline(run.convertChildren(node), delimiter),
      );
    }

    for (const [tag, role] of Object.entries(ROLES)) {
      converter.addHandler(tag, (node, run) =>
        wrapInline(run.convertChildren(node), MONOSPACE, role),
      );
    }

    converter.addHandler("span", (node, run) => {
      const content = run.convertChildren(node);
      const className = getAttribute(node, "class")?.trim();
      if (!className) return content;
      return wrapInline(content, MONOSPACE, classRoles(className));
    });
  };
}
