/**
 * Tags command - List the tags with a conversion rule
 */

import chalk from "chalk";
import { createConverter, SnippetRegistry } from "../../converter";
import { loadDefaultConfig } from "../../utils";

export async function tagsCommand(): Promise<void> {
  const config = await loadDefaultConfig();
  const converter = createConverter(
    config.asciidoc,
    new SnippetRegistry(),
    () => undefined,
  );

  // Handler keys use "_" for the namespace separator
  for (const tag of converter.supportedTags()) {
    const [prefix, name] = tag.split("_");
    console.log(name ? `  ${chalk.dim(`${prefix}:`)}${name}` : `  ${tag}`);
  }
}
