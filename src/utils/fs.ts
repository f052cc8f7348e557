/**
 * File System Utilities
 * Document discovery and reading for the loaders
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";

/**
 * Options for file discovery
 */
export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd: string;
  /** How many directory levels below cwd to descend into (1 = only cwd) */
  deep?: number;
}

/**
 * A discovered document with its content
 */
export interface LoadedDocument {
  /** Absolute path to the file */
  path: string;
  /** File name without its extension */
  stem: string;
  text: string;
}

/**
 * Find regular files matching glob patterns, in enumeration order
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const { patterns, ignore = [], cwd, deep = 1 } = options;

  return fg(patterns, {
    cwd,
    absolute: true,
    onlyFiles: true,
    deep,
    ignore,
    dot: false,
  });
}

/**
 * Read a file as UTF-8
 */
export async function readFileWithEncoding(
  filePath: string,
  encoding: BufferEncoding = "utf-8"
): Promise<string> {
  return fsPromises.readFile(filePath, { encoding });
}

export interface ReadDocumentsOptions {
  patterns?: string[];
  ignore?: string[];
}

/**
 * Yields every matching document directly inside a folder, one at a time.
 * Files are read lazily so a failing consumer stops further reads.
 */
export async function* readDocuments(
  folder: string,
  options: ReadDocumentsOptions = {}
): AsyncGenerator<LoadedDocument> {
  const { patterns = ["*.kdl"], ignore = [] } = options;
  const files = await findFiles({ patterns, ignore, cwd: folder });

  for (const file of files) {
    yield {
      path: file,
      stem: path.basename(file, path.extname(file)),
      text: await readFileWithEncoding(file),
    };
  }
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}
