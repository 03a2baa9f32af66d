import { createCatalogResolver, type FileCatalog } from "./file-resolver.js";
import { planJobInputs, type InputPlan, type PlanOptions } from "./input-planner.js";
import { parseJobInput } from "./job-input.js";
import { LINK_KEY } from "./links.js";
import type { JsonObject } from "./logger.js";

export function fileLink(id: string, project?: string): JsonObject {
  return project ? { [LINK_KEY]: { project, id } } : { [LINK_KEY]: id };
}

export function planFromRaw(
  raw: JsonObject,
  catalog: FileCatalog,
  opts: Omit<PlanOptions, "resolver"> = {},
): InputPlan {
  const resolver = createCatalogResolver(catalog);
  return planJobInputs(parseJobInput(raw, resolver), { ...opts, resolver });
}
