/**
 * convert command - Turn a directory of domain model CSV tables into N-Quads
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger, parseConvertOptions } from "../../utils/index.js";
import {
  convertDomainModel,
  type ConversionProgressEvent,
  type ConversionSummary,
} from "../../core/converter/index.js";

const logger = createLogger("convert-command");

export interface ConvertCommandOptions {
  input?: string;
  output?: string;
  log?: string;
  mapping?: string;
  unfiltered?: boolean;
  expanded?: boolean;
  versionInfo?: string;
  name?: string;
  label?: string;
}

/**
 * Format duration in human readable format
 */
function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Convert the domain model and print a summary
 */
export async function convertCommand(options: ConvertCommandOptions): Promise<void> {
  logger.debug({ options }, "Starting conversion");

  const parsed = parseConvertOptions({
    input: options.input,
    output: options.output,
    log: options.log,
    mapping: options.mapping,
    unfiltered: options.unfiltered ?? false,
    expanded: options.expanded ?? false,
    version: options.versionInfo,
    name: options.name,
    label: options.label,
  });

  if (!parsed.ok) {
    console.log(chalk.red("Invalid options:"));
    for (const problem of parsed.error) {
      console.log(`  ${chalk.red("✗")} ${problem}`);
    }
    process.exit(1);
  }
  const config = parsed.value;

  console.log();
  console.log(chalk.cyan.bold("Converting Domain Model"));
  console.log(chalk.dim("─".repeat(40)));
  console.log(`  ${chalk.dim("Input:")}  ${config.input}`);
  console.log(`  ${chalk.dim("Output:")} ${config.output}`);
  console.log();

  const spinner = ora("Reading tables...").start();

  try {
    const summary = convertDomainModel(config, {
      onProgress: (event: ConversionProgressEvent) => updateSpinner(spinner, event),
    });

    spinner.succeed(chalk.green("Conversion complete!"));
    printSummary(summary);

    if (config.mapping) {
      console.log(chalk.dim(`Icon mapping written to ${config.mapping}`));
    }
    logger.info({ graph: summary.graph, quads: summary.quads }, "Conversion complete");
  } catch (error) {
    spinner.fail(chalk.red("Conversion failed"));
    logger.error({ err: error }, "Conversion failed");
    if (config.log) {
      console.log(chalk.dim(`See ${config.log} for the construction sequence`));
    }
    throw error;
  }
}

function printSummary(summary: ConversionSummary): void {
  console.log();
  console.log(chalk.white.bold("Domain Model"));
  console.log(`  Graph:       ${summary.graph}`);
  console.log(`  Label:       ${summary.label}`);
  console.log(`  Version:     ${summary.versionInfo}`);
  console.log(`  Population:  ${summary.population ? chalk.green("expanded") : chalk.dim("average only")}`);

  console.log();
  console.log(chalk.white.bold("Features"));
  if (summary.features.length === 0) {
    console.log(chalk.dim("  (none)"));
  }
  for (const feature of summary.features) {
    console.log(`  ${chalk.green("✓")} ${feature}`);
  }

  console.log();
  console.log(chalk.white.bold("Packages"));
  for (const record of summary.packages) {
    const mark = record.enabled ? chalk.green("✓") : chalk.dim("✗");
    console.log(`  ${mark} ${record.uri} ${chalk.dim(record.label)}`);
  }

  console.log();
  console.log(chalk.white.bold("Sections"));
  for (const { section, count } of summary.sections) {
    console.log(`  ${section.padEnd(28)} ${count}`);
  }

  console.log();
  console.log(chalk.white.bold("Results"));
  console.log(`  Quads written:   ${summary.quads}`);
  if (summary.skippedQuads > 0) {
    console.log(`  Quads skipped:   ${chalk.yellow(String(summary.skippedQuads))}`);
  }
  console.log(`  Duration:        ${formatDuration(summary.durationMs)}`);
  console.log();
  console.log(chalk.dim("─".repeat(40)));
}

/**
 * Update spinner text based on conversion progress
 */
function updateSpinner(spinner: ReturnType<typeof ora>, event: ConversionProgressEvent): void {
  const progress = `${event.completed}/${event.total}`;
  spinner.text = event.section
    ? `Writing ${event.section} (${progress}, ${event.percentage}%)`
    : `Finishing (${event.percentage}%)`;
}
