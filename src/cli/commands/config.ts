/**
 * Config command - Show where configuration is read from
 */

import chalk from "chalk";
import { getUserConfigPath, isFile } from "../../utils";

export async function configCommand(): Promise<void> {
  const configPath = getUserConfigPath();
  const present = await isFile(configPath);

  console.log("User configuration file:");
  console.log(
    `  ${configPath} ${present ? chalk.green("(found)") : chalk.dim("(not created)")}`,
  );
  console.log("\nIt is merged over src/config/default.json; --config merges one more file on top.");
  console.log("Known snippet names listed under snippets.known accumulate across files.");
}
