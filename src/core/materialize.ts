import path from "node:path";

import type { JobConfig } from "./config.js";
import { listPlannedFiles, type InputPlan } from "./input-planner.js";
import { silentLogger, type EventLogger } from "./logger.js";
import { ensureDirectory, inputDir, type HomeOptions } from "./paths.js";

// =============================================================================
// DOWNLOAD MANIFEST
// =============================================================================

export type DownloadEntry = {
  key: string;
  sourceId: string;
  destination: string;
};

export function buildDownloadManifest(
  plan: InputPlan,
  config: JobConfig,
  opts: HomeOptions = {},
): DownloadEntry[] {
  const root = inputDir(config, opts);
  return listPlannedFiles(plan).map((file) => ({
    key: file.key,
    sourceId: file.sourceId,
    destination: path.posix.join(root, file.targetPath),
  }));
}

// =============================================================================
// DIRECTORIES
// =============================================================================

export function createInputDirectories(
  plan: InputPlan,
  config: JobConfig,
  logger: EventLogger = silentLogger,
): string[] {
  const root = inputDir(config);
  const created = [root, ...plan.dirs.map((dir) => path.join(root, dir))];

  for (const dir of created) {
    ensureDirectory(dir);
  }

  logger.log({
    type: "inputs.mkdir",
    message: `Prepared ${plan.dirs.length} input director${plan.dirs.length === 1 ? "y" : "ies"} under ${root}`,
    payload: { root, dirs: plan.dirs },
  });
  return created;
}
