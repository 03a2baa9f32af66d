import { Command } from "commander";

import { registerBashVarsCommand } from "./cli/bash-vars.js";
import { reportCliError } from "./cli/context.js";
import { registerInputCommands } from "./cli/inputs.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("job-inputs")
    .description("Plan where job input files land and expose inputs as shell variables")
    .option("--home <dir>", "Job home directory (default: $HOME)")
    .option("--catalog <path>", "File catalog JSON used to resolve file links")
    .option("--input <path>", "Job input JSON (default: $HOME/job_input.json)")
    .option("--debug", "Print error details and stack traces", false);

  registerInputCommands(program);
  registerBashVarsCommand(program);

  return program;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  try {
    await program.parseAsync(argv);
  } catch (err) {
    reportCliError(err, { debug: program.opts().debug === true });
  }
}

export * from "./core/bash-vars.js";
export * from "./core/config.js";
export * from "./core/errors.js";
export * from "./core/file-resolver.js";
export * from "./core/filenames.js";
export * from "./core/input-planner.js";
export * from "./core/job-input.js";
export * from "./core/links.js";
export * from "./core/materialize.js";
export * from "./core/paths.js";
