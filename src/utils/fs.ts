/**
 * File System Utilities
 * JSON file reading and writing for config and snapshot files
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import * as path from "node:path";

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
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

/**
 * Write content to a file, creating parent directories if needed
 */
export async function writeFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fsPromises.writeFile(filePath, content);
}

/**
 * Read and parse a JSON file. Parse errors propagate as SyntaxError.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await fsPromises.readFile(filePath, "utf-8");
  return JSON.parse(content);
}

/**
 * Serialize `data` as indented JSON, creating parent directories if needed
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`);
}
