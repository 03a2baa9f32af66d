import { z } from "zod";

import type { JsonObject, JsonValue } from "./logger.js";

// =============================================================================
// LINK FORMAT
// =============================================================================

export const LINK_KEY = "$dnanexus_link";

const ObjectTargetSchema = z
  .object({ id: z.string().min(1), project: z.string().min(1).optional() })
  .passthrough();

const JobOutputTargetSchema = z
  .object({ job: z.string().min(1), field: z.string().min(1) })
  .passthrough();

const LinkSchema = z.object({
  [LINK_KEY]: z.union([z.string().min(1), ObjectTargetSchema, JobOutputTargetSchema]),
});

export type PlatformLink = z.infer<typeof LinkSchema>;

export type LinkedObject = {
  id: string;
  project?: string;
};

export function isLink(value: unknown): value is PlatformLink {
  return LinkSchema.safeParse(value).success;
}

/** Object id and project a link points at; job-output links have neither. */
export function linkTarget(link: PlatformLink): LinkedObject | null {
  const target = link[LINK_KEY];
  if (typeof target === "string") {
    return { id: target };
  }

  const parsed = ObjectTargetSchema.safeParse(target);
  if (!parsed.success) {
    return null;
  }
  return parsed.data.project ? { id: parsed.data.id, project: parsed.data.project } : { id: parsed.data.id };
}

export function encodeLink(object: LinkedObject): JsonObject {
  const target: JsonValue = object.project ? { project: object.project, id: object.id } : object.id;
  return { [LINK_KEY]: target };
}
