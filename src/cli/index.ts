/**
 * CLI entry point for slideforge
 * Handles command-line argument parsing and dispatch
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { listCommand } from "./commands/list";
import { initCommand } from "./commands/init";
import { configCommand } from "./commands/config";
import { pdfToPptxCommand, pptxToPdfCommand } from "./commands/bridge";

const program = new Command();

program
  .name("slideforge")
  .description("Aggregate numbered HTML slides into a PDF or PPTX deck")
  .version("0.1.0");

// Main conversion command (default action)
program
  .option("-i, --input <path>", "Input directory containing HTML slides")
  .option("-o, --output <name>", "Output filename (extension added when missing)")
  .option("-f, --format <format>", "Output format: pdf or pptx")
  .option("-b, --backend <backend>", "Render backend: browser or layout")
  .option("-r, --range <range>", 'Slides to include, e.g. "3", "2-4" or "1,3,5"')
  .option("-p, --parallel", "Render slides concurrently")
  .option("-w, --workers <count>", "Worker count for parallel rendering")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--force", "Overwrite an existing output file")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

program
  .command("list")
  .description("List slides in render order")
  .option("-i, --input <path>", "Input directory containing HTML slides")
  .option("-c, --config <path>", "Path to custom config file")
  .action(listCommand);

program
  .command("init <count>")
  .description("Create numbered placeholder slides")
  .option("-i, --input <path>", "Directory to create the slides in")
  .option("-t, --template <path>", "Handlebars template for each slide")
  .option("-c, --config <path>", "Path to custom config file")
  .action(initCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program
  .command("pdf-to-pptx <pdf>")
  .description("Convert a PDF into a deck of full-slide page images")
  .option("-o, --output <path>", "Output .pptx path")
  .option("--dpi <dpi>", "Rasterization resolution")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--force", "Overwrite an existing output file")
  .option("-v, --verbose", "Verbose output")
  .action(pdfToPptxCommand);

program
  .command("pptx-to-pdf <pptx>")
  .description("Convert a deck to PDF with LibreOffice, or a degraded extraction")
  .option("-o, --output <path>", "Output .pdf path")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--force", "Overwrite an existing output file")
  .option("-v, --verbose", "Verbose output")
  .action(pptxToPdfCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
