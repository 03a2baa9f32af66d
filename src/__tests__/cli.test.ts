import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { Command } from "commander";
import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { buildCli } from "../index.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const FIXTURE_DIR = path.join(process.cwd(), "test", "fixtures", "job-home");

function spyConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => undefined),
    error: vi.spyOn(console, "error").mockImplementation(() => undefined),
  };
}

let home: string;
let spies: ReturnType<typeof spyConsole>;

beforeEach(() => {
  home = fs.mkdtempSync(path.join(os.tmpdir(), "job-inputs-cli-"));
  fse.copySync(FIXTURE_DIR, home);
  spies = spyConsole();
});

afterEach(() => {
  fs.rmSync(home, { recursive: true, force: true });
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

// =============================================================================
// HELPERS
// =============================================================================

async function runCli(args: string[]): Promise<string[]> {
  const program = buildCli();
  installExitOverride(program);
  spies.log.mockClear();
  await program.parseAsync([
    "node",
    "job-inputs",
    "--home",
    home,
    "--catalog",
    path.join(home, "catalog.json"),
    ...args,
  ]);
  return spies.log.mock.calls.map((call: unknown[]) => call.join(" "));
}

function installExitOverride(command: Command): void {
  command.exitOverride();

  for (const child of command.commands) {
    installExitOverride(child);
  }
}

// =============================================================================
// TESTS
// =============================================================================

describe("job-inputs CLI", () => {
  it("prints the job layout", async () => {
    expect(await runCli(["paths"])).toEqual([
      `input_dir: ${home}/in`,
      `output_dir: ${home}/out`,
      `input_json: ${path.join(home, "job_input.json")}`,
      `output_json: ${path.join(home, "job_output.json")}`,
    ]);
    expect(await runCli(["paths", "--no-expand-home"])).toContain("input_dir: $HOME/in");
  });

  it("prints the plan as JSON", async () => {
    const [output] = await runCli(["plan", "--json"]);

    expect(JSON.parse(output ?? "")).toEqual({
      dirs: ["seq1", "reads", "reads/0", "reads/1"],
      files: {
        seq1: [
          { target_path: "seq1/NC_000868.fasta", source_id: "file-1111", name: "NC_000868.fasta" },
        ],
        reads: [
          { target_path: "reads/0/A.fastq", source_id: "file-3333", name: "A.fastq" },
          { target_path: "reads/1/B.fastq", source_id: "file-4444", name: "B.fastq" },
        ],
      },
      rest: { blast_args: "", evalue: 0.01 },
    });
  });

  it("prints a readable plan summary", async () => {
    expect(await runCli(["plan"])).toEqual([
      "Files (3) in 4 directories:",
      "- seq1: file-1111 -> seq1/NC_000868.fasta",
      "- reads: file-3333 -> reads/0/A.fastq",
      "- reads: file-4444 -> reads/1/B.fastq",
      "Other inputs: blast_args, evalue",
    ]);
  });

  it("prints the download manifest", async () => {
    const [output] = await runCli(["download-manifest"]);

    expect(JSON.parse(output ?? "")).toEqual([
      { key: "seq1", sourceId: "file-1111", destination: `${home}/in/seq1/NC_000868.fasta` },
      { key: "reads", sourceId: "file-3333", destination: `${home}/in/reads/0/A.fastq` },
      { key: "reads", sourceId: "file-4444", destination: `${home}/in/reads/1/B.fastq` },
    ]);
  });

  it("creates the input directories", async () => {
    expect(await runCli(["mkdirs"])).toEqual(["Input directories ready: 5"]);
    expect(fs.statSync(path.join(home, "in", "reads", "1")).isDirectory()).toBe(true);
  });

  it("prints shell exports", async () => {
    expect(await runCli(["bash-vars"])).toEqual([
      "export blast_args=''",
      "export evalue=0.01",
      `export seq1='{"$dnanexus_link":{"project":"project-1111","id":"file-1111"}}'`,
      "export seq1_filename=NC_000868.fasta",
      "export seq1_prefix=NC_000868",
      'export seq1_path="$HOME"/in/seq1/NC_000868.fasta',
      `export reads=( '{"$dnanexus_link":"file-3333"}' '{"$dnanexus_link":"file-4444"}' )`,
      "export reads_filename=( A.fastq B.fastq )",
      "export reads_prefix=( A B )",
      'export reads_path=( "$HOME"/in/reads/0/A.fastq "$HOME"/in/reads/1/B.fastq )',
    ]);
  });

  it("prints legacy exports with absolute paths on request", async () => {
    const lines = await runCli(["bash-vars", "--legacy", "--expand-home"]);

    expect(lines[0]).toBe(
      `export seq1='{"$dnanexus_link":{"project":"project-1111","id":"file-1111"}}'`,
    );
    expect(lines[3]).toBe(`export seq1_path=${home}/in/seq1/NC_000868.fasta`);
    expect(lines.slice(-2)).toEqual(["export blast_args=''", "export evalue=0.01"]);
  });

  it("removes the output file and tolerates a missing one", async () => {
    fs.writeFileSync(path.join(home, "job_output.json"), "{}", "utf8");

    expect(await runCli(["rm-output"])).toEqual([`Removed ${path.join(home, "job_output.json")}`]);
    expect(await runCli(["rm-output"])).toEqual([
      `No output file at ${path.join(home, "job_output.json")}`,
    ]);
  });

  it("reports a missing input file", async () => {
    fs.rmSync(path.join(home, "job_input.json"));

    expect(await runCli(["plan"])).toEqual([]);
    expect(spies.error.mock.calls.map((call: unknown[]) => call.join(" "))).toEqual([
      "Error: Job input missing.",
      `Unable to load job input from ${path.join(home, "job_input.json")}`,
      "Hint: Make sure job_input.json exists and holds valid JSON, or pass --input.",
    ]);
    expect(process.exitCode).toBe(1);
  });
});
