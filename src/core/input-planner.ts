/*
Purpose: decide where every file input lands under the input directory.
Assumptions: paths are relative to <HOME>/in and use POSIX separators.
Usage: const plan = planJobInputs(loadJobInput(path, resolver), { resolver, logger });

Layout for an input key FOO:
  FOO = file               -> FOO/<name>
  FOO = [A, B, ..., K]     -> FOO/00/<A>, FOO/01/<B>, ..., FOO/10/<K>
Each array entry gets its own numbered directory so equal names never clobber.
*/

import path from "node:path";

import { InvalidInputError } from "./errors.js";
import type { FileReferenceResolver, RemoteFileHandle } from "./file-resolver.js";
import { makeUnixFilename } from "./filenames.js";
import { rawInputValue, type InputElement, type ParsedJobInput } from "./job-input.js";
import { logWarning, silentLogger, type EventLogger, type JsonValue } from "./logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type FileDescriptor = {
  targetPath: string;
  handle: RemoteFileHandle;
  sourceId: string;
};

export type InputPlan = {
  /** Parents always come before their subdirectories. */
  dirs: string[];
  files: Map<string, FileDescriptor[]>;
  rest: Map<string, JsonValue>;
};

export type MixedArrayPolicy = "drop" | "reject";

export type PlanOptions = {
  resolver: FileReferenceResolver;
  logger?: EventLogger;
  mixedArrays?: MixedArrayPolicy;
};

// =============================================================================
// PLANNING
// =============================================================================

export function planJobInputs(input: ParsedJobInput, opts: PlanOptions): InputPlan {
  const builder = new PlanBuilder(opts);

  for (const entry of input.entries) {
    const descriptors =
      entry.value.kind === "list"
        ? builder.addFileArray(entry.key, entry.value.items)
        : builder.addFile(entry.key, null, entry.value);

    if (descriptors.length === 0) {
      builder.rest.set(entry.key, rawInputValue(entry.value));
    } else {
      builder.files.set(entry.key, descriptors);
    }
  }

  return { dirs: builder.dirs, files: builder.files, rest: builder.rest };
}

export function arraySubdirName(index: number, length: number): string {
  const width = String(length - 1).length;
  return String(index).padStart(width, "0");
}

export function listPlannedFiles(plan: InputPlan): Array<FileDescriptor & { key: string }> {
  return [...plan.files].flatMap(([key, descriptors]) =>
    descriptors.map((descriptor) => ({ key, ...descriptor })),
  );
}

// =============================================================================
// INTERNALS
// =============================================================================

class PlanBuilder {
  readonly dirs: string[] = [];
  readonly files = new Map<string, FileDescriptor[]>();
  readonly rest = new Map<string, JsonValue>();
  private readonly seenDirs = new Set<string>();
  private readonly logger: EventLogger;

  constructor(private readonly opts: PlanOptions) {
    this.logger = opts.logger ?? silentLogger;
  }

  addFileArray(key: string, items: InputElement[]): FileDescriptor[] {
    const descriptors: FileDescriptor[] = [];
    const dropped: number[] = [];

    items.forEach((item, index) => {
      const before = descriptors.length;
      descriptors.push(...this.addFile(key, arraySubdirName(index, items.length), item));
      if (descriptors.length === before) dropped.push(index);
    });

    if (descriptors.length > 0 && dropped.length > 0) {
      this.reportMixedArray(key, dropped);
    }
    return descriptors;
  }

  addFile(key: string, subdir: string | null, element: InputElement): FileDescriptor[] {
    if (element.kind !== "file-reference") {
      return [];
    }

    const handle = this.opts.resolver.resolve(element.value);
    if (!handle) {
      this.logger.log({
        type: "plan.non_file_reference",
        level: "debug",
        message: `Input ${key} links to an object that is not a file; passing it through as a value`,
        payload: { key },
      });
      return [];
    }

    const filename = makeUnixFilename(handle.name);
    // The array's own directory is planned once a file resolves, so an array
    // holding no files adds nothing to the directory plan.
    if (subdir !== null) {
      this.recordDir(key);
    }
    const targetDir = subdir === null ? key : path.posix.join(key, subdir);
    this.recordDir(targetDir);

    return [{ targetPath: path.posix.join(targetDir, filename), handle, sourceId: handle.id }];
  }

  private recordDir(dir: string): void {
    if (this.seenDirs.has(dir)) return;
    this.seenDirs.add(dir);
    this.dirs.push(dir);
  }

  private reportMixedArray(key: string, dropped: number[]): void {
    const message = `Input ${key} mixes files with other values; entries ${dropped.join(", ")} are left out of the download plan`;
    if (this.opts.mixedArrays === "reject") {
      throw new InvalidInputError(message);
    }
    logWarning(this.logger, "plan.mixed_array", message, { key, dropped });
  }
}
