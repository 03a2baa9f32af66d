import type { Command } from "commander";
import { z } from "zod";

import {
  formatExportLines,
  formatInputExports,
  generateExportLines,
  synthesizeBashVars,
} from "../core/bash-vars.js";
import { inputDir } from "../core/paths.js";

import { withCliErrors } from "./context.js";

const BashVarsOptions = z.object({
  legacy: z.boolean().default(false),
  raw: z.boolean().default(false),
  collisionCheck: z.boolean().default(true),
  expandHome: z.boolean().default(false),
});

export function registerBashVarsCommand(program: Command): void {
  program
    .command("bash-vars")
    .description("Print job inputs as shell export lines")
    .option("--legacy", "Use the export renderer without collision checks", false)
    .option("--raw", "Export the input document as is, without file planning", false)
    .option("--no-collision-check", "Keep variables that shadow the current environment")
    .option("--expand-home", "Write *_path variables with an absolute input directory", false)
    .action(
      withCliErrors(BashVarsOptions, (opts, ctx) => {
        if (opts.raw) {
          const text = formatInputExports(ctx.loadInput());
          if (text) console.log(text);
          return;
        }

        const { plan } = ctx.loadPlan();
        const inputRoot = inputDir(ctx.config, { expandHome: opts.expandHome });
        const lines = opts.legacy
          ? generateExportLines(plan, inputRoot)
          : formatExportLines(
              synthesizeBashVars(plan, {
                existingNames: ctx.config.names(),
                logger: ctx.logger,
                checkCollisions: opts.collisionCheck,
                inputRoot,
              }),
            );

        for (const line of lines) {
          console.log(line);
        }
      }),
    );
}
