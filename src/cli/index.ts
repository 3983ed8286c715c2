#!/usr/bin/env node

/**
 * CLI entry point for diffpress
 * Handles command-line argument parsing and dispatch
 */

import { Command } from "commander";
import { batchCommand } from "./commands/batch";
import { compareCommand } from "./commands/compare";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("diffpress")
  .description("Render HTML comparisons of file pairs and publish them to Confluence")
  .version("0.1.0");

// Batch command - CSV-driven fetch, compare and publish
program
  .command("batch")
  .description("Compare every file pair listed in a CSV file and publish the results")
  .option("--datafile <path>", "CSV file: infile1,pageid1,infile2,pageid2,outfile,pageid3")
  .option("--username <name>", "Confluence username used for authentication")
  .option("--base-url <url>", "Confluence base URL")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--timeout <ms>", "Milliseconds allowed per Confluence or render call (0 = none)")
  .option("--engine <engine>", "Diff renderer: builtin or vimdiff")
  .option("--strict", "Exit non-zero when any row fails")
  .option("--no-pause", "Do not wait for <ENTER> between rows")
  .option("-y, --yes", "Overwrite existing output files without asking")
  .option("--report <path>", "Write a JSON report of the run")
  .option("--debug", "Debug output, including each Confluence request")
  .option("-v, --verbose", "List every recorded issue in the summary")
  .action(batchCommand);

// Compare command - one file pair to one HTML file
program
  .command("compare")
  .description("Render the differences between two text files as HTML")
  .option("--infile1 <path>", "First input file (text)")
  .option("--infile2 <path>", "Second input file (text)")
  .option("--outfile <path>", "Output file; .html is appended unless it ends in .html or .htm")
  .option("--colorscheme <name>", "Color scheme (default from config, 'desert')")
  .option("--engine <engine>", "Diff renderer: builtin or vimdiff")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-y, --yes", "Overwrite an existing output file without asking")
  .option("--debug", "Debug output")
  .action(compareCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
