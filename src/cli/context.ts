import type { Command } from "commander";
import { z } from "zod";

import { CATALOG_ENV, JobConfig, type EnvironmentSource } from "../core/config.js";
import {
  formatErrorLines,
  renderErrorLines,
  createAnsiFormatter,
  resolveColorEnabled,
} from "../core/error-format.js";
import {
  createCatalogResolver,
  loadFileCatalog,
  type FileReferenceResolver,
} from "../core/file-resolver.js";
import { planJobInputs, type InputPlan, type MixedArrayPolicy } from "../core/input-planner.js";
import { loadJobInput, type ParsedJobInput } from "../core/job-input.js";
import { JsonlLogger, combineLoggers, createStreamLogger, type EventLogger } from "../core/logger.js";
import { inputJsonPath } from "../core/paths.js";

// =============================================================================
// TYPES
// =============================================================================

const GlobalOptionsSchema = z.object({
  home: z.string().min(1).optional(),
  catalog: z.string().min(1).optional(),
  input: z.string().min(1).optional(),
  debug: z.boolean().default(false),
});

export type CliContext = {
  config: JobConfig;
  logger: EventLogger;
  debug: boolean;
  inputPath: () => string;
  loadInput: () => ParsedJobInput;
  loadPlan: (opts?: { mixedArrays?: MixedArrayPolicy }) => { input: ParsedJobInput; plan: InputPlan };
};

// =============================================================================
// CONTEXT
// =============================================================================

export function buildContext(command: Command, env: EnvironmentSource = process.env): CliContext {
  const globals = GlobalOptionsSchema.parse(command.optsWithGlobals());
  const overrides: EnvironmentSource = {};
  if (globals.home) overrides.HOME = globals.home;
  if (globals.catalog) overrides[CATALOG_ENV] = globals.catalog;

  const config = JobConfig.fromEnvironment(env, overrides);
  const settings = config.settings();
  const streamLogger = createStreamLogger(process.stderr, { format: settings.logFormat });
  const logger = settings.logFile
    ? combineLoggers(streamLogger, new JsonlLogger(settings.logFile))
    : streamLogger;

  let resolver: FileReferenceResolver | undefined;
  const getResolver = (): FileReferenceResolver => {
    resolver ??= createCatalogResolver(settings.catalogPath ? loadFileCatalog(settings.catalogPath) : {});
    return resolver;
  };

  const inputPath = (): string => globals.input ?? inputJsonPath(config);
  const loadInput = (): ParsedJobInput => loadJobInput(inputPath(), getResolver());

  return {
    config,
    logger,
    debug: globals.debug,
    inputPath,
    loadInput,
    loadPlan: (opts = {}) => {
      const input = loadInput();
      const plan = planJobInputs(input, {
        resolver: getResolver(),
        logger,
        mixedArrays: opts.mixedArrays,
      });
      return { input, plan };
    },
  };
}

// =============================================================================
// ERROR OUTPUT
// =============================================================================

export function reportCliError(error: unknown, opts: { debug: boolean }): void {
  const lines = formatErrorLines(error, { mode: opts.debug ? "debug" : "short" });
  const format = createAnsiFormatter(resolveColorEnabled(process.stderr));
  for (const line of renderErrorLines(lines, format)) {
    console.error(line);
  }
  process.exitCode = 1;
}

/** Runs a command body, printing failures instead of letting them escape. */
export function withCliErrors<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  body: (opts: z.output<TSchema>, ctx: CliContext) => void,
): (opts: unknown, command: Command) => void {
  return (opts, command) => {
    const debug = command.optsWithGlobals().debug === true;
    try {
      body(schema.parse(opts), buildContext(command));
    } catch (err) {
      reportCliError(err, { debug });
    }
  };
}
