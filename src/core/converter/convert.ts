/**
 * File-level conversion: CSV directory in, N-Quads file out, plus the
 * optional icon mapping and construction-sequence trace.
 *
 * @module
 */

import { ConfigurationError, ErrorCode } from "../errors.js";
import { buildIconMapping, serializeIconMapping } from "../emitters/index.js";
import { FileSink } from "../nquads/index.js";
import { CsvTableSource, type TableSource } from "../tables/index.js";
import { createConverter, type ConversionProgressEvent, type ConversionSummary } from "./converter.js";
import { isDirectorySync, writeTextFileSync } from "../../utils/fs.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import type { ConvertOptions } from "../../utils/validation.js";

const logger = createLogger("convert");

export interface ConvertRunOptions {
  /** Defaults to the CSV files in `options.input` */
  tables?: TableSource;
  logger?: Logger;
  onProgress?: (event: ConversionProgressEvent) => void;
}

/**
 * Run one conversion. The trace file is written even when sequencing fails,
 * so that the cycle can be inspected.
 *
 * @throws ConfigurationError if the input directory does not exist
 */
export function convertDomainModel(options: ConvertOptions, run: ConvertRunOptions = {}): ConversionSummary {
  const log = run.logger ?? logger;

  let tables = run.tables;
  if (!tables) {
    if (!isDirectorySync(options.input)) {
      throw new ConfigurationError(
        `Input directory not found: ${options.input}`,
        ErrorCode.CONFIG_TABLE_NOT_FOUND
      );
    }
    tables = new CsvTableSource(options.input);
  }

  const converter = createConverter({
    tables,
    sink: new FileSink(options.output),
    flags: { unfiltered: options.unfiltered, expanded: options.expanded },
    header: { version: options.version, name: options.name, label: options.label },
    logger: log,
    onProgress: run.onProgress,
  });

  let summary: ConversionSummary;
  try {
    summary = converter.run();
  } finally {
    if (options.log) {
      const trace = converter.context.sequenceTrace;
      if (trace !== null) {
        writeTextFileSync(options.log, trace);
        log.info({ path: options.log }, "Construction sequence trace written");
      } else {
        log.info({ path: options.log }, "No construction sequence was computed; trace not written");
      }
    }
  }

  if (options.mapping) {
    const ontology = summary.graph.split("/").pop() ?? summary.graph;
    writeTextFileSync(options.mapping, serializeIconMapping(buildIconMapping(tables, ontology, summary.graph)));
    log.info({ path: options.mapping, ontology }, "Icon mapping written");
  }

  return summary;
}
