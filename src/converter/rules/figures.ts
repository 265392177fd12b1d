/**
 * Rule: Figures and captions
 *
 * A <figcaption> is not rendered where it appears; the enclosing figure
 * turns it into a block title (".Caption") above its content.
 */

import type { Element } from "domhandler";
import type { ConversionRun, ConverterPlugin } from "../../types";
import type { CaptionSlot } from "../context";

function convertFigure(node: Element, run: ConversionRun): string {
  const caption: CaptionSlot = {};
  const body = run.state.scoped("figureCaption", caption, () =>
    run.convertChildren(node),
  );

  const title = caption.value?.trim();
  if (!title) return body;
  return `\n.${title}\n${body.trim()}\n`;
}

function convertFigureCaption(node: Element, run: ConversionRun): string {
  const slot = run.state.figureCaption;

  if (!slot) {
    run.warn("<figcaption> outside of a figure, dropped");
  } else if (slot.value !== undefined) {
    run.warn("second <figcaption> in a figure, dropped");
  } else {
    slot.value = run.convertChildren(node).replace(/\n/g, " ");
  }

  return "";
}

export function figureRules(): ConverterPlugin {
  return (converter) => {
    converter.addHandler("figure", convertFigure);
    converter.addHandler("figcaption", convertFigureCaption);
  };
}
