/*
Purpose: explicit snapshot of the job's environment-backed settings.
Assumptions: the process environment is read once; nothing here writes to it except apply().
Usage: const config = JobConfig.fromEnvironment(process.env, { HOME: "/home/job" }); config.home.
*/

import { z } from "zod";

import { ConfigError } from "./errors.js";

// =============================================================================
// SETTINGS
// =============================================================================

export const CATALOG_ENV = "JOB_FILE_CATALOG";
export const LOG_FORMAT_ENV = "JOB_INPUTS_LOG_FORMAT";
export const LOG_FILE_ENV = "JOB_INPUTS_LOG_FILE";

const SettingsSchema = z.object({
  HOME: z.string().min(1).optional(),
  [CATALOG_ENV]: z.string().min(1).optional(),
  [LOG_FORMAT_ENV]: z.enum(["text", "jsonl"]).default("text"),
  [LOG_FILE_ENV]: z.string().min(1).optional(),
});

export type JobSettings = {
  home?: string;
  catalogPath?: string;
  logFormat: "text" | "jsonl";
  logFile?: string;
};

export type EnvironmentSource = Record<string, string | undefined>;

// =============================================================================
// CONFIG
// =============================================================================

export class JobConfig {
  private readonly values: Map<string, string>;

  private constructor(values: Map<string, string>) {
    this.values = values;
  }

  static fromEnvironment(
    env: EnvironmentSource = process.env,
    overrides: EnvironmentSource = {},
  ): JobConfig {
    const values = new Map<string, string>();
    for (const [name, value] of [...Object.entries(env), ...Object.entries(overrides)]) {
      if (value === undefined) continue;
      values.set(name, value);
    }
    return new JobConfig(values);
  }

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  set(name: string, value: string): void {
    this.values.set(name, value);
  }

  names(): Set<string> {
    return new Set(this.values.keys());
  }

  get home(): string {
    const home = this.settings().home;
    if (!home) {
      throw new ConfigError("HOME is not set; cannot locate the job input and output files.");
    }
    return home;
  }

  settings(): JobSettings {
    const parsed = SettingsSchema.safeParse(Object.fromEntries(this.values));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.join(".") || "environment";
      throw new ConfigError(`Invalid setting ${where}: ${issue?.message ?? "unknown issue"}`, parsed.error);
    }

    return {
      home: parsed.data.HOME,
      catalogPath: parsed.data[CATALOG_ENV],
      logFormat: parsed.data[LOG_FORMAT_ENV],
      logFile: parsed.data[LOG_FILE_ENV],
    };
  }

  apply(target: EnvironmentSource = process.env): void {
    for (const [name, value] of this.values) {
      target[name] = value;
    }
  }
}
