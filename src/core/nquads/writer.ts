/**
 * N-Quads writer
 *
 * Writes statements into a single named graph, one per line, interleaved
 * with `#` comment lines that separate sections and resources.
 *
 * @module
 */

import * as fs from "node:fs";
import * as nodePath from "node:path";
import { DomainModelError, ErrorCode } from "../errors.js";
import { ensureDirectorySync } from "../../utils/fs.js";
import { createLogger, type Logger } from "../../utils/logger.js";

// =============================================================================
// Sinks
// =============================================================================

export interface QuadSink {
  write(chunk: string): void;
  close(): void;
}

/**
 * Synchronous file sink; the whole conversion runs without yielding
 */
export class FileSink implements QuadSink {
  private fd: number | null;

  constructor(readonly path: string) {
    try {
      ensureDirectorySync(nodePath.dirname(path));
      this.fd = fs.openSync(path, "w");
    } catch (error) {
      throw new DomainModelError(`Cannot open ${path} for writing`, ErrorCode.FILE_SYSTEM_ERROR, {
        path,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  write(chunk: string): void {
    if (this.fd === null) {
      throw new DomainModelError(`${this.path} is already closed`, ErrorCode.FILE_SYSTEM_ERROR);
    }
    fs.writeSync(this.fd, chunk);
  }

  close(): void {
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }
}

/**
 * Collects output in memory
 */
export class MemorySink implements QuadSink {
  private readonly chunks: string[] = [];
  closed = false;

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  close(): void {
    this.closed = true;
  }

  text(): string {
    return this.chunks.join("");
  }

  lines(): string[] {
    return this.text().split("\n").filter((line) => line !== "");
  }
}

// =============================================================================
// Writer
// =============================================================================

export class NQuadsWriter {
  private graph: string | null = null;
  private quads = 0;
  private skipped = 0;
  private readonly logger: Logger;

  constructor(private readonly sink: QuadSink, logger?: Logger) {
    this.logger = logger ?? createLogger("nquads");
  }

  /** Set the graph IRI term (already bracketed) that every quad is written into */
  setGraph(graph: string): void {
    this.graph = graph;
  }

  get graphTerm(): string {
    if (this.graph === null) {
      throw new DomainModelError("No graph has been set", ErrorCode.UNKNOWN_ERROR);
    }
    return this.graph;
  }

  get quadCount(): number {
    return this.quads;
  }

  get skippedCount(): number {
    return this.skipped;
  }

  quad(subject: string, predicate: string, object: string): void {
    const graph = this.graphTerm;
    if (subject === "" || predicate === "" || object === "") {
      this.skipped++;
      this.logger.warn({ subject, predicate, object }, "Skipping statement with an empty term");
      return;
    }
    this.sink.write(`${subject} ${predicate} ${object} ${graph} .\n`);
    this.quads++;
  }

  comment(text = ""): void {
    this.sink.write(`# ${text}\n`);
  }

  /** Blank comment line between resources */
  spacer(): void {
    this.comment();
  }

  section(heading: string): void {
    this.comment();
    this.comment(heading);
    this.comment();
  }

  close(): void {
    this.sink.close();
  }
}
