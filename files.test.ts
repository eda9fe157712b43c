import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, FormatError, OutputError } from "./errors.ts";
import {
  formatFromPath,
  listReferenceFiles,
  loadSources,
  readSource,
  resolveInputs,
  writeOutput,
} from "./files.ts";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "bib2md-files-"));
  fs.writeFileSync(path.join(dir, "b.bib"), "@misc{b1, title = {B}}\n");
  fs.writeFileSync(path.join(dir, "a.ris"), "TY  - GEN\nID  - a1\nER  - \n");
  fs.writeFileSync(path.join(dir, "notes.txt"), "not a reference file");
  fs.mkdirSync(path.join(dir, "nested"));
  fs.writeFileSync(path.join(dir, "nested", "c.bib"), "@misc{c1}\n");
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("formatFromPath", () => {
  it("maps extensions to formats", () => {
    expect(formatFromPath("refs.bib")).toBe("bibtex");
    expect(formatFromPath("REFS.RIS")).toBe("ris");
    expect(formatFromPath("refs.txt")).toBeUndefined();
  });
});

describe("listReferenceFiles", () => {
  it("lists reference files of one directory, sorted", () => {
    expect(listReferenceFiles(dir)).toEqual([
      path.join(dir, "a.ris"),
      path.join(dir, "b.bib"),
    ]);
  });
});

describe("resolveInputs", () => {
  it("expands directories and keeps explicit files", () => {
    expect(resolveInputs([path.join(dir, "nested", "c.bib"), dir])).toEqual([
      { path: path.join(dir, "a.ris"), format: "ris" },
      { path: path.join(dir, "b.bib"), format: "bibtex" },
      { path: path.join(dir, "nested", "c.bib"), format: "bibtex" },
    ]);
  });

  it("rejects missing paths and unknown extensions", () => {
    expect(() => resolveInputs([path.join(dir, "missing.bib")])).toThrow(
      ConfigError,
    );
    expect(() => resolveInputs([path.join(dir, "notes.txt")])).toThrow(
      `Not a .bib or .ris file: ${path.join(dir, "notes.txt")}`,
    );
  });
});

describe("readSource", () => {
  it("parses and normalizes a file", () => {
    let source = readSource({ path: path.join(dir, "b.bib"), format: "bibtex" });
    expect(source.references.map((r) => [r.key, r.title])).toEqual([
      ["b1", "B"],
    ]);
    expect(source.warnings).toEqual([]);
  });

  it("turns an unreadable file into a FormatError", () => {
    let file = path.join(dir, "gone.ris");
    expect(() => readSource({ path: file, format: "ris" })).toThrow(
      `${file}: cannot be read`,
    );
  });
});

describe("loadSources", () => {
  it("skips files that fail to parse", () => {
    let bad = path.join(dir, "bad.bib");
    fs.writeFileSync(bad, "no entries here");
    let { sources, failures } = loadSources([
      { path: bad, format: "bibtex" },
      { path: path.join(dir, "a.ris"), format: "ris" },
    ]);
    expect(sources.map((s) => s.path)).toEqual([path.join(dir, "a.ris")]);
    expect(failures).toHaveLength(1);
    expect(failures[0]).toBeInstanceOf(FormatError);
    expect(failures[0].reason).toBe("no BibTeX entries found");
  });
});

describe("writeOutput", () => {
  it("creates parent directories", () => {
    let file = path.join(dir, "out", "deep", "page.md");
    writeOutput(file, "hello");
    expect(fs.readFileSync(file, "utf8")).toBe("hello");
  });

  it("throws an OutputError when the destination cannot be written", () => {
    let file = path.join(dir, "b.bib", "page.md");
    expect(() => writeOutput(file, "hello")).toThrow(OutputError);
  });
});
