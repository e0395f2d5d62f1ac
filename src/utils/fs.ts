/**
 * File System Utilities
 * Synchronous helpers for the conversion outputs
 */

import * as fs from "node:fs";
import * as path from "node:path";

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export function ensureDirectorySync(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

export function isDirectorySync(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Write text to a file, creating parent directories if needed
 */
export function writeTextFileSync(filePath: string, content: string): void {
  ensureDirectorySync(path.dirname(filePath));
  fs.writeFileSync(filePath, content, "utf-8");
}
