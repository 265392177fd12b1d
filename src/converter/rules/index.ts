/**
 * Conversion Rules Index
 * Exports all tag rules for Flare content
 */

export { structureRules } from "./structure";
export { headingRules } from "./headings";
export { paragraphRules } from "./paragraphs";
export { divRules } from "./divs";
export { listRules } from "./lists";
export { imageRules } from "./images";
export { anchorRules } from "./anchors";
export { inlineRules } from "./inline";
export { tableRules } from "./tables";
export { figureRules } from "./figures";
export { madcapRules } from "./madcap";
