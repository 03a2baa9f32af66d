import fs from "node:fs";
import path from "node:path";

import type { JobConfig } from "./config.js";
import { FilesystemError } from "./errors.js";

// =============================================================================
// JOB LAYOUT
// =============================================================================

export const HOME_TOKEN = "$HOME";
export const INPUT_DIR_NAME = "in";
export const OUTPUT_DIR_NAME = "out";
export const INPUT_JSON_NAME = "job_input.json";
export const OUTPUT_JSON_NAME = "job_output.json";

/** Input directory as the job's shell sees it, before $HOME expands. */
export const RELATIVE_INPUT_DIR = path.posix.join(HOME_TOKEN, INPUT_DIR_NAME);

export type HomeOptions = {
  // false keeps the literal $HOME token so the path expands inside the job's shell.
  expandHome?: boolean;
};

export function homePath(config: JobConfig, opts: HomeOptions = {}): string {
  return (opts.expandHome ?? true) ? config.home : HOME_TOKEN;
}

export function inputDir(config: JobConfig, opts: HomeOptions = {}): string {
  return path.posix.join(homePath(config, opts), INPUT_DIR_NAME);
}

export function outputDir(config: JobConfig, opts: HomeOptions = {}): string {
  return path.posix.join(homePath(config, opts), OUTPUT_DIR_NAME);
}

export function inputJsonPath(config: JobConfig): string {
  return path.join(config.home, INPUT_JSON_NAME);
}

export function outputJsonPath(config: JobConfig): string {
  return path.join(config.home, OUTPUT_JSON_NAME);
}

// =============================================================================
// FILESYSTEM
// =============================================================================

/**
 * Creates one directory level. Parents are never created, so callers walk a
 * directory plan in order.
 */
export function ensureDirectory(dirPath: string): void {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(dirPath);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
      throw err;
    }
    fs.mkdirSync(dirPath);
    return;
  }

  if (!stat.isDirectory()) {
    throw new FilesystemError(
      `Path ${dirPath} already exists, and it is a file, not a directory`,
      dirPath,
    );
  }
}

/** Returns false when there was no output file to remove. */
export function removeOutputJson(config: JobConfig): boolean {
  try {
    fs.unlinkSync(outputJsonPath(config));
    return true;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return false;
    }
    throw err;
  }
}
