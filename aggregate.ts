import type { FormatError } from "./errors.ts";
import { loadSources, resolveInputs, type Source, writeOutput } from "./files.ts";
import { toBibtex, toRis } from "./serialize.ts";

/**
 * - `bib`: BibTeX sources only
 * - `ris`: RIS sources only
 * - `all-to-bib`: every source, RIS records converted to BibTeX
 */
export type AggregateMode = "bib" | "ris" | "all-to-bib";

export type AggregateOutputs = {
  bib?: string;
  ris?: string;
  allToBib?: string;
};

export type AggregateResult = {
  written: Array<{ path: string; mode: AggregateMode; count: number }>;
  failures: Array<FormatError>;
};

/**
 * Serializes the references of `sources` into one combined document, in
 * source order and then entry order. Duplicates are kept.
 */
export function aggregate(
  sources: Array<Source>,
  mode: AggregateMode,
): { text: string; count: number } {
  let buffer: Array<string> = [];
  for (let source of sources) {
    for (let ref of source.references) {
      if (mode === "all-to-bib") buffer.push(toBibtex(ref));
      else if (mode === "bib" && ref.format === "bibtex") {
        buffer.push(toBibtex(ref));
      } else if (mode === "ris" && ref.format === "ris") {
        buffer.push(toRis(ref));
      }
    }
  }
  let text = buffer.length > 0 ? `${buffer.join("\n\n")}\n` : "";
  return { text, count: buffer.length };
}

/** Writes each requested combined file from already loaded sources. */
export function writeAggregates(
  sources: Array<Source>,
  outputs: AggregateOutputs,
): AggregateResult["written"] {
  let targets: Array<[AggregateMode, string | undefined]> = [
    ["bib", outputs.bib],
    ["ris", outputs.ris],
    ["all-to-bib", outputs.allToBib],
  ];
  let written: AggregateResult["written"] = [];
  for (let [mode, file] of targets) {
    if (!file) continue;
    let { text, count } = aggregate(sources, mode);
    writeOutput(file, text);
    written.push({ path: file, mode, count });
  }
  return written;
}

/**
 * Combines the reference files found at `paths` (files or directories) into
 * the requested outputs. Unreadable files are skipped and reported.
 */
export function concatenateReferenceFiles(
  paths: Array<string>,
  outputs: AggregateOutputs,
): AggregateResult {
  let { sources, failures } = loadSources(resolveInputs(paths));
  return { written: writeAggregates(sources, outputs), failures };
}
