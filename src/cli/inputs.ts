import type { Command } from "commander";
import { z } from "zod";

import { listPlannedFiles, type InputPlan } from "../core/input-planner.js";
import { buildDownloadManifest, createInputDirectories } from "../core/materialize.js";
import {
  inputDir,
  inputJsonPath,
  outputDir,
  outputJsonPath,
  removeOutputJson,
} from "../core/paths.js";

import { withCliErrors } from "./context.js";

const ExpandHomeOptions = z.object({ expandHome: z.boolean().default(true) });

const PlanOptions = z.object({
  json: z.boolean().default(false),
  rejectMixedArrays: z.boolean().default(false),
});

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerInputCommands(program: Command): void {
  program
    .command("paths")
    .description("Show the job's input and output locations")
    .option("--no-expand-home", "Print directories relative to $HOME")
    .action(
      withCliErrors(ExpandHomeOptions, (opts, ctx) => {
        const home = { expandHome: opts.expandHome };
        console.log(`input_dir: ${inputDir(ctx.config, home)}`);
        console.log(`output_dir: ${outputDir(ctx.config, home)}`);
        console.log(`input_json: ${inputJsonPath(ctx.config)}`);
        console.log(`output_json: ${outputJsonPath(ctx.config)}`);
      }),
    );

  program
    .command("plan")
    .description("Show where each file input will be placed")
    .option("--json", "Emit the plan as JSON", false)
    .option("--reject-mixed-arrays", "Fail when an array mixes files and plain values", false)
    .action(
      withCliErrors(PlanOptions, (opts, ctx) => {
        const { plan } = ctx.loadPlan({ mixedArrays: opts.rejectMixedArrays ? "reject" : "drop" });
        if (opts.json) {
          console.log(JSON.stringify(planToJson(plan), null, 2));
          return;
        }
        printPlan(plan);
      }),
    );

  program
    .command("download-manifest")
    .description("Emit the source id to destination list for every file input")
    .option("--no-expand-home", "Write destinations relative to $HOME")
    .action(
      withCliErrors(ExpandHomeOptions, (opts, ctx) => {
        const { plan } = ctx.loadPlan();
        const manifest = buildDownloadManifest(plan, ctx.config, { expandHome: opts.expandHome });
        console.log(JSON.stringify(manifest, null, 2));
      }),
    );

  program
    .command("mkdirs")
    .description("Create the input directory layout for every file input")
    .action(
      withCliErrors(z.object({}), (_opts, ctx) => {
        const { plan } = ctx.loadPlan();
        const created = createInputDirectories(plan, ctx.config, ctx.logger);
        console.log(`Input directories ready: ${created.length}`);
      }),
    );

  program
    .command("rm-output")
    .description("Delete the job output JSON file (test runs only)")
    .action(
      withCliErrors(z.object({}), (_opts, ctx) => {
        const removed = removeOutputJson(ctx.config);
        ctx.logger.log({
          type: "output.removed",
          level: "debug",
          payload: { path: outputJsonPath(ctx.config), removed },
        });
        console.log(
          removed
            ? `Removed ${outputJsonPath(ctx.config)}`
            : `No output file at ${outputJsonPath(ctx.config)}`,
        );
      }),
    );
}

// =============================================================================
// OUTPUT
// =============================================================================

export function planToJson(plan: InputPlan): {
  dirs: string[];
  files: Record<string, Array<{ target_path: string; source_id: string; name: string }>>;
  rest: Record<string, unknown>;
} {
  return {
    dirs: plan.dirs,
    files: Object.fromEntries(
      [...plan.files].map(([key, descriptors]) => [
        key,
        descriptors.map((file) => ({
          target_path: file.targetPath,
          source_id: file.sourceId,
          name: file.handle.name,
        })),
      ]),
    ),
    rest: Object.fromEntries(plan.rest),
  };
}

function printPlan(plan: InputPlan): void {
  const files = listPlannedFiles(plan);
  if (files.length === 0) {
    console.log("No file inputs.");
  } else {
    console.log(`Files (${files.length}) in ${plan.dirs.length} director${plan.dirs.length === 1 ? "y" : "ies"}:`);
    for (const file of files) {
      console.log(`- ${file.key}: ${file.sourceId} -> ${file.targetPath}`);
    }
  }

  if (plan.rest.size > 0) {
    console.log(`Other inputs: ${[...plan.rest.keys()].join(", ")}`);
  }
}
