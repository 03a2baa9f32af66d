import { InvalidFilenameError } from "./errors.js";

const RESERVED_FILENAMES = new Set([".", ".."]);

/**
 * Makes a platform file name safe to use as a single path segment on Unix.
 * Slashes become `%2F`; nothing else is filtered.
 */
export function makeUnixFilename(name: string): string {
  if (RESERVED_FILENAMES.has(name)) {
    throw new InvalidFilenameError(name);
  }
  return name.replaceAll("/", "%2F");
}

/**
 * Drops the last extension of a basename, once. Leading dots do not start an
 * extension, so `.bashrc` is returned unchanged and `A.tar.gz` becomes `A.tar`.
 */
export function filePrefix(basename: string): string {
  const dot = basename.lastIndexOf(".");
  if (dot <= 0) return basename;

  const hasStem = basename.slice(0, dot).split("").some((char) => char !== ".");
  return hasStem ? basename.slice(0, dot) : basename;
}
