import fse from "fs-extra";
import { z } from "zod";

import { InvalidInputError, MissingInputFileError } from "./errors.js";
import type { FileReferenceResolver } from "./file-resolver.js";
import type { JsonValue } from "./logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type InputElement =
  | { kind: "scalar"; value: JsonValue }
  | { kind: "file-reference"; value: JsonValue };

export type InputValue = InputElement | { kind: "list"; items: InputElement[] };

export type JobInputEntry = {
  key: string;
  value: InputValue;
};

export type ParsedJobInput = {
  entries: JobInputEntry[];
};

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

// =============================================================================
// LOADING
// =============================================================================

export function loadJobInput(inputPath: string, resolver: FileReferenceResolver): ParsedJobInput {
  let raw: unknown;
  try {
    raw = fse.readJsonSync(inputPath);
  } catch (err) {
    throw new MissingInputFileError(inputPath, err);
  }
  return parseJobInput(raw, resolver);
}

export function parseJobInput(raw: unknown, resolver: FileReferenceResolver): ParsedJobInput {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new InvalidInputError("Job input must be a JSON object keyed by input name");
  }

  // Entries come from the raw object: z.record drops an own "__proto__" key.
  const entries = Object.entries(raw).map(([key, value]): JobInputEntry => {
    const parsed = JsonValueSchema.safeParse(value);
    if (!parsed.success) {
      throw new InvalidInputError(`Job input ${key} holds a value that is not JSON`, parsed.error);
    }
    return { key, value: classifyValue(parsed.data, resolver) };
  });

  return { entries };
}

// =============================================================================
// VALUES
// =============================================================================

export function rawInputValue(value: InputValue): JsonValue {
  return value.kind === "list" ? value.items.map((item) => item.value) : value.value;
}

function classifyValue(value: JsonValue, resolver: FileReferenceResolver): InputValue {
  if (Array.isArray(value)) {
    return { kind: "list", items: value.map((item) => classifyElement(item, resolver)) };
  }
  return classifyElement(value, resolver);
}

function classifyElement(value: JsonValue, resolver: FileReferenceResolver): InputElement {
  return resolver.isReference(value)
    ? { kind: "file-reference", value }
    : { kind: "scalar", value };
}
