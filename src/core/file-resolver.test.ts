import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, describe, expect, it } from "vitest";

import { InvalidInputError, MissingInputFileError } from "./errors.js";
import { createCatalogResolver, loadFileCatalog } from "./file-resolver.js";
import { fileLink } from "./job-input.test-helpers.js";
import { LINK_KEY, encodeLink, isLink, linkTarget } from "./links.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("links", () => {
  it("recognizes string and object link targets", () => {
    expect(isLink({ [LINK_KEY]: "file-1111" })).toBe(true);
    expect(isLink({ [LINK_KEY]: { project: "project-1", id: "file-1111" } })).toBe(true);
    expect(isLink({ [LINK_KEY]: { job: "job-1", field: "out" } })).toBe(true);
  });

  it("ignores plain values", () => {
    expect(isLink("file-1111")).toBe(false);
    expect(isLink(["file-1111"])).toBe(false);
    expect(isLink({ id: "file-1111" })).toBe(false);
    expect(isLink({ [LINK_KEY]: 42 })).toBe(false);
    expect(isLink(null)).toBe(false);
  });

  it("extracts the linked object", () => {
    expect(linkTarget({ [LINK_KEY]: "file-1111" })).toEqual({ id: "file-1111" });
    expect(linkTarget({ [LINK_KEY]: { project: "project-1", id: "file-1111" } })).toEqual({
      id: "file-1111",
      project: "project-1",
    });
    expect(linkTarget({ [LINK_KEY]: { job: "job-1", field: "out" } })).toBeNull();
  });

  it("encodes handles back into links", () => {
    expect(JSON.stringify(encodeLink({ id: "file-1111" }))).toBe('{"$dnanexus_link":"file-1111"}');
    expect(JSON.stringify(encodeLink({ id: "file-1111", project: "project-1" }))).toBe(
      '{"$dnanexus_link":{"project":"project-1","id":"file-1111"}}',
    );
  });
});

describe("createCatalogResolver", () => {
  const resolver = createCatalogResolver({
    "file-1111": { name: "NC_1.fasta", project: "project-catalog" },
    "file-2222": { name: "reads.fq" },
  });

  it("resolves file links to handles", () => {
    expect(resolver.isReference(fileLink("file-2222"))).toBe(true);
    expect(resolver.resolve(fileLink("file-2222"))).toEqual({ id: "file-2222", name: "reads.fq" });
  });

  it("prefers the project named by the link", () => {
    expect(resolver.resolve(fileLink("file-1111"))).toEqual({
      id: "file-1111",
      name: "NC_1.fasta",
      project: "project-catalog",
    });
    expect(resolver.resolve(fileLink("file-1111", "project-link"))).toEqual({
      id: "file-1111",
      name: "NC_1.fasta",
      project: "project-link",
    });
  });

  it("returns null for links to objects that are not files", () => {
    expect(resolver.resolve(fileLink("record-9999"))).toBeNull();
    expect(resolver.resolve({ [LINK_KEY]: { job: "job-1", field: "out" } })).toBeNull();
    expect(resolver.resolve("file-1111")).toBeNull();
  });

  it("fails on files missing from the catalog", () => {
    expect(() => resolver.resolve(fileLink("file-3333"))).toThrow(InvalidInputError);
    expect(() => resolver.resolve(fileLink("file-3333"))).toThrow(
      "File file-3333 is not listed in the catalog",
    );
  });
});

describe("loadFileCatalog", () => {
  function makeTempDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "file-catalog-"));
    tempDirs.push(dir);
    return dir;
  }

  it("loads a catalog file", () => {
    const catalogPath = path.join(makeTempDir(), "catalog.json");
    fse.writeJsonSync(catalogPath, { "file-1111": { name: "NC_1.fasta" } });

    expect(loadFileCatalog(catalogPath)).toEqual({ "file-1111": { name: "NC_1.fasta" } });
  });

  it("reports a missing catalog", () => {
    const catalogPath = path.join(makeTempDir(), "missing.json");
    expect(() => loadFileCatalog(catalogPath)).toThrow(MissingInputFileError);
  });

  it("rejects entries that are not file ids", () => {
    const catalogPath = path.join(makeTempDir(), "catalog.json");
    fse.writeJsonSync(catalogPath, { "record-1": { name: "x" } });

    expect(() => loadFileCatalog(catalogPath)).toThrow(InvalidInputError);
  });
});
