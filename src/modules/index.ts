/**
 * Pipeline modules export
 */

export { scan } from "./scanner";
export { process } from "./processor";
export { snippets } from "./snippets";
export { stats } from "./stats";
