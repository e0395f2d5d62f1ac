#!/usr/bin/env node

/**
 * domain-model-nq CLI
 * Converts a domain model's CSV tables into an N-Quads domain graph
 */

import { Command } from "commander";
import chalk from "chalk";
import { convertCommand } from "./commands/convert.js";
import { isDomainModelError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("domain-model-nq")
  .description("Convert domain model CSV tables into an N-Quads domain graph")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("convert", { isDefault: true })
  .description("Convert a directory of CSV tables into N-Quads")
  .option("-i, --input <dir>", "Directory containing the CSV tables")
  .option("-o, --output <file>", "N-Quads output file")
  .option("-l, --log <file>", "Write the construction pattern sequence to this file")
  .option("-m, --mapping <file>", "Write the asset icon mapping JSON to this file")
  .option("-u, --unfiltered", "Make every entity visible and drop construction-state flags")
  .option("-e, --expanded", "Expand controls, misbehaviours and TWAs into min/average/max")
  .option("-v, --version-info <version>", "Ontology version (defaults to the current time)")
  .option("-n, --name <name>", "Replace the last segment of the domain graph URI")
  .option("-b, --label <label>", "Replace the ontology label")
  .action(convertCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Handle uncaught errors
 */
function handleError(error: unknown): void {
  if (isDomainModelError(error)) {
    logger.error({ err: error.toJSON() }, "Conversion error");
    console.error(chalk.red(`\n${error.toString()}`));
    if (process.env.DEBUG) {
      console.error(chalk.dim(error.stack));
    }
  } else if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

// Handle unhandled promise rejections
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// Handle uncaught exceptions
process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Parse and Execute
// =============================================================================

// Parse command line arguments
program.parseAsync(process.argv).catch(handleError);
