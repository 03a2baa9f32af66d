import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { JsonlLogger, combineLoggers, createStreamLogger, logWarning } from "./logger.js";

function captureStream(): { chunks: string[]; write: (chunk: string) => boolean } {
  const chunks: string[] = [];
  return {
    chunks,
    write: (chunk) => {
      chunks.push(chunk);
      return true;
    },
  };
}

describe("createStreamLogger", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("writes human-readable warnings by default", () => {
    const stream = captureStream();
    const logger = createStreamLogger(stream);

    logWarning(logger, "bash_vars.collision", "Creating environment variable (HOME) would cause a name collision");

    expect(stream.chunks).toEqual([
      "warning: Creating environment variable (HOME) would cause a name collision\n",
    ]);
  });

  it("filters events below the minimum level", () => {
    const stream = captureStream();
    const logger = createStreamLogger(stream);

    logger.log({ type: "plan.non_file_reference", level: "debug", message: "skipped" });
    logger.log({ type: "inputs.mkdir" });

    expect(stream.chunks).toEqual(["info: inputs.mkdir\n"]);
  });

  it("writes JSONL when asked", () => {
    const stream = captureStream();
    const logger = createStreamLogger(stream, { format: "jsonl" });

    logger.log({ type: "output.removed", payload: { removed: true } });

    expect(stream.chunks.map((chunk) => JSON.parse(chunk))).toEqual([
      { ts: "2024-01-01T00:00:00.000Z", type: "output.removed", level: "info", payload: { removed: true } },
    ]);
  });
});

describe("JsonlLogger", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("appends one JSON object per event with the base fields", () => {
    const logPath = path.join(dir, "logs", "job-inputs.jsonl");
    const logger = new JsonlLogger(logPath, { job: "job-1" });
    const stream = captureStream();

    combineLoggers(logger, createStreamLogger(stream)).log({ type: "inputs.mkdir", message: "ok" });
    logger.log({ type: "output.removed", level: "debug" });

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n").map((line) => JSON.parse(line));
    expect(lines.map((line) => [line.job, line.type, line.level])).toEqual([
      ["job-1", "inputs.mkdir", "info"],
      ["job-1", "output.removed", "debug"],
    ]);
    expect(stream.chunks).toEqual(["info: ok\n"]);
  });
});
