/*
Purpose: render planned job inputs as shell variable assignments.
Assumptions: values are evaluated by bash; array-valued inputs become bash arrays.
Usage: formatExportLines(synthesizeBashVars(plan, { existingNames: config.names(), logger })).

For a file input key `genes` holding $HOME/in/genes/{0/A.txt,1/B.txt}:
  genes=( '{"$dnanexus_link":"file-a"}' '{"$dnanexus_link":"file-b"}' )
  genes_filename=( A.txt B.txt )
  genes_prefix=( A B )
  genes_path=( "$HOME"/in/genes/0/A.txt "$HOME"/in/genes/1/B.txt )
*/

import path from "node:path";

import type { RemoteFileHandle } from "./file-resolver.js";
import { filePrefix } from "./filenames.js";
import type { InputPlan } from "./input-planner.js";
import { rawInputValue, type ParsedJobInput } from "./job-input.js";
import { encodeLink } from "./links.js";
import { logWarning, silentLogger, type EventLogger, type JsonValue } from "./logger.js";
import { HOME_TOKEN, RELATIVE_INPUT_DIR } from "./paths.js";
import { isShellVariableName, shellArray, shellQuote, shellQuoteExpanding } from "./shell-quote.js";

// =============================================================================
// TYPES
// =============================================================================

export type KeyDescriptor = {
  handles: RemoteFileHandle[];
  filenames: string[];
  prefixes: string[];
  paths: string[];
};

export type BashElement =
  | { kind: "string"; value: string }
  | { kind: "path"; value: string }
  | { kind: "file"; handle: RemoteFileHandle }
  | { kind: "json"; value: JsonValue };

export type SynthesizeOptions = {
  existingNames?: ReadonlySet<string>;
  logger?: EventLogger;
  checkCollisions?: boolean;
  inputRoot?: string;
};

// =============================================================================
// KEY DESCRIPTORS
// =============================================================================

/** Paths default to the unexpanded `$HOME/in` root. */
export function describeFileKeys(
  plan: InputPlan,
  inputRoot: string = RELATIVE_INPUT_DIR,
): Map<string, KeyDescriptor> {
  const descriptors = new Map<string, KeyDescriptor>();

  for (const [key, files] of plan.files) {
    const desc: KeyDescriptor = { handles: [], filenames: [], prefixes: [], paths: [] };
    for (const file of files) {
      const basename = path.posix.basename(file.targetPath);
      desc.handles.push(file.handle);
      desc.filenames.push(basename);
      desc.prefixes.push(filePrefix(basename));
      desc.paths.push(path.posix.join(inputRoot, file.targetPath));
    }
    descriptors.set(key, desc);
  }

  return descriptors;
}

// =============================================================================
// VALUE ENCODING
// =============================================================================

export function jsonElement(value: JsonValue): BashElement {
  return typeof value === "string" ? { kind: "string", value } : { kind: "json", value };
}

export function encodeElement(element: BashElement): string {
  switch (element.kind) {
    case "string":
      return shellQuote(element.value);
    case "path":
      return shellQuoteExpanding(element.value, HOME_TOKEN);
    case "file":
      return shellQuote(JSON.stringify(encodeLink(element.handle)));
    case "json":
      return shellQuote(JSON.stringify(element.value));
  }
}

/** A single element is written bare; anything else becomes a bash array. */
export function encodeElements(elements: BashElement[]): string {
  const [only] = elements;
  if (elements.length === 1 && only) {
    return encodeElement(only);
  }
  return shellArray(elements.map(encodeElement));
}

export function encodeJsonValue(value: JsonValue): string {
  return Array.isArray(value) ? encodeElements(value.map(jsonElement)) : encodeElement(jsonElement(value));
}

function fileKeyValues(key: string, desc: KeyDescriptor): Array<[string, string]> {
  const strings = (values: string[]): string =>
    encodeElements(values.map((value): BashElement => ({ kind: "string", value })));

  return [
    [key, encodeElements(desc.handles.map((handle): BashElement => ({ kind: "file", handle })))],
    [`${key}_filename`, strings(desc.filenames)],
    [`${key}_prefix`, strings(desc.prefixes)],
    [`${key}_path`, encodeElements(desc.paths.map((value): BashElement => ({ kind: "path", value })))],
  ];
}

// =============================================================================
// SYNTHESIS
// =============================================================================

/**
 * Plain inputs register before file inputs, so when names collide the
 * file-derived variable is the one dropped.
 */
export function synthesizeBashVars(
  plan: InputPlan,
  opts: SynthesizeOptions = {},
): Map<string, string> {
  const logger = opts.logger ?? silentLogger;
  const existing = opts.existingNames ?? new Set<string>();
  const checkCollisions = opts.checkCollisions ?? true;
  const vars = new Map<string, string>();

  const register = (name: string, value: string): void => {
    if (!isShellVariableName(name)) {
      logWarning(
        logger,
        "bash_vars.invalid_name",
        `Input ${name} is not a valid shell variable name; skipping it`,
        { name },
      );
      return;
    }
    if (checkCollisions && (existing.has(name) || vars.has(name))) {
      logWarning(
        logger,
        "bash_vars.collision",
        `Creating environment variable (${name}) would cause a name collision`,
        { name },
      );
      return;
    }
    vars.set(name, value);
  };

  for (const [key, value] of plan.rest) {
    register(key, encodeJsonValue(value));
  }
  for (const [key, desc] of describeFileKeys(plan, opts.inputRoot)) {
    for (const [name, value] of fileKeyValues(key, desc)) {
      register(name, value);
    }
  }

  return vars;
}

export function formatExportLines(vars: ReadonlyMap<string, string>): string[] {
  return [...vars].map(([name, value]) => `export ${name}=${value}`);
}

// =============================================================================
// LEGACY RENDERINGS
// =============================================================================

/**
 * Export lines without the collision guard. File keys come first and plain
 * inputs are written as a single JSON word, lists included.
 */
export function generateExportLines(plan: InputPlan, inputRoot?: string): string[] {
  const lines: string[] = [];

  for (const [key, desc] of describeFileKeys(plan, inputRoot)) {
    for (const [name, value] of fileKeyValues(key, desc)) {
      lines.push(`export ${name}=${value}`);
    }
  }
  for (const [key, value] of plan.rest) {
    lines.push(`export ${key}=${encodeElement(jsonElement(value))}`);
  }

  return lines;
}

/** One export per raw input; lists always render as bash arrays. */
export function formatInputExports(input: ParsedJobInput): string {
  return input.entries
    .map(({ key, value }) => {
      const raw = rawInputValue(value);
      const encoded = Array.isArray(raw)
        ? shellArray(raw.map((item) => encodeElement(jsonElement(item))))
        : encodeElement(jsonElement(raw));
      return `export ${key}=${encoded}`;
    })
    .join("\n");
}
