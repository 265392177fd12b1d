#!/usr/bin/env node

/**
 * CLI entry point for the Flare to AsciiDoc Converter
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";
import { tagsCommand } from "./commands/tags";

const program = new Command();

program
  .name("flare2adoc")
  .description("Convert MadCap Flare topics and snippets to AsciiDoc")
  .version("0.1.0");

// Main conversion command (default action)
program
  .option("-i, --input <path>", "Input directory containing Flare files")
  .option("-o, --output <path>", "Output directory for AsciiDoc files")
  .option("-c, --config <path>", "Path to custom config file")
  .option(
    "-k, --known-snippets <path>",
    "AsciiDoc attributes file whose snippet definitions already exist",
  )
  .option("--dry-run", "Preview conversion without writing files")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

// Tags command - list the tags the converter understands
program
  .command("tags")
  .description("List supported Flare tags")
  .action(tagsCommand);

program.parse();
