#!/usr/bin/env node

/**
 * CLI entry point for the static site cross-reference checker
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { checkCommand } from "./commands/check";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("site-xref")
  .description("Check links, images and anchors in a generated static site")
  .version("0.1.0");

// Main check command (default action)
program
  .argument("[directory]", "Site output directory containing HTML files")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-r, --report <path>", "Write a JSON report to this path")
  .option("--duplicate-ids", "Report ids defined more than once in a page")
  .option("--strict", "Fail on duplicate ids as well as broken references")
  .option("--concurrency <n>", "Number of files scanned at once")
  .option("-v, --verbose", "Verbose output")
  .action(checkCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
