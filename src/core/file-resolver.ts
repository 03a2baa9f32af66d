/*
Purpose: decide which input values are platform file references and turn them into handles.
Assumptions: the planner never looks inside a reference; it only asks this seam.
Usage: const resolver = createCatalogResolver(loadFileCatalog(path)); resolver.resolve(value).
*/

import fse from "fs-extra";
import { z } from "zod";

import { InvalidInputError, MissingInputFileError } from "./errors.js";
import { isLink, linkTarget } from "./links.js";
import type { JsonValue } from "./logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type RemoteFileHandle = {
  id: string;
  name: string;
  project?: string;
};

export interface FileReferenceResolver {
  isReference(value: JsonValue): boolean;
  /** Null when the reference points at something other than a file. */
  resolve(reference: JsonValue): RemoteFileHandle | null;
}

const FILE_ID_PREFIX = "file-";

// =============================================================================
// CATALOG RESOLVER
// =============================================================================

const FileCatalogSchema = z.record(
  z.string().startsWith(FILE_ID_PREFIX),
  z.object({
    name: z.string(),
    project: z.string().min(1).optional(),
  }),
);

export type FileCatalog = z.infer<typeof FileCatalogSchema>;

export function loadFileCatalog(catalogPath: string): FileCatalog {
  let raw: unknown;
  try {
    raw = fse.readJsonSync(catalogPath);
  } catch (err) {
    throw new MissingInputFileError(catalogPath, err);
  }

  const parsed = FileCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(`File catalog ${catalogPath} is malformed`, parsed.error);
  }
  return parsed.data;
}

export function createCatalogResolver(catalog: FileCatalog): FileReferenceResolver {
  return {
    isReference: (value) => isLink(value),
    resolve(reference) {
      if (!isLink(reference)) {
        return null;
      }

      const target = linkTarget(reference);
      if (!target || !target.id.startsWith(FILE_ID_PREFIX)) {
        return null;
      }

      const entry = Object.hasOwn(catalog, target.id) ? catalog[target.id] : undefined;
      if (!entry) {
        throw new InvalidInputError(`File ${target.id} is not listed in the catalog`);
      }

      const project = target.project ?? entry.project;
      return project
        ? { id: target.id, name: entry.name, project }
        : { id: target.id, name: entry.name };
    },
  };
}
