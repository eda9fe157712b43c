import * as fs from "node:fs";
import * as path from "node:path";
import { type ParseResult, parseBibtex } from "./bibtex.ts";
import { ConfigError, FormatError, OutputError, type ParseWarning } from "./errors.ts";
import { normalize } from "./normalize.ts";
import { FORMAT_EXTENSIONS, type Reference, type ReferenceFormat } from "./record.ts";
import { parseRis } from "./ris.ts";

export type Input = { path: string; format: ReferenceFormat };

/** The normalized references of one input file. */
export type Source = Input & {
  references: Array<Reference>;
  warnings: Array<ParseWarning>;
};

export function formatFromPath(file: string): ReferenceFormat | undefined {
  let ext = path.extname(file).toLowerCase();
  if (ext === FORMAT_EXTENSIONS.bibtex) return "bibtex";
  if (ext === FORMAT_EXTENSIONS.ris) return "ris";
  return undefined;
}

/** `.bib` and `.ris` files directly inside `dir`, sorted by path. */
export function listReferenceFiles(dir: string): Array<string> {
  return fs.readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && formatFromPath(entry.name))
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

/**
 * Expands directories to the reference files they hold and pairs every file
 * with its format. The result is sorted by path so that repeated runs see the
 * files in the same order.
 */
export function resolveInputs(paths: Array<string>): Array<Input> {
  let files = paths.flatMap((p) => {
    let stat = fs.statSync(p, { throwIfNoEntry: false });
    if (!stat) throw new ConfigError(`Input not found: ${p}`);
    return stat.isDirectory() ? listReferenceFiles(p) : [p];
  });
  return files.sort().map((file) => {
    let format = formatFromPath(file);
    if (!format) {
      throw new ConfigError(`Not a .bib or .ris file: ${file}`);
    }
    return { path: file, format };
  });
}

export function parseReferences(
  text: string,
  format: ReferenceFormat,
  source: string,
): ParseResult {
  return format === "bibtex"
    ? parseBibtex(text, source)
    : parseRis(text, source);
}

/** Reads, parses and normalizes one input. Throws {@link FormatError}. */
export function readSource(input: Input): Source {
  let text: string;
  try {
    text = fs.readFileSync(input.path, "utf8");
  } catch (error) {
    throw new FormatError(input.path, "cannot be read", { cause: error });
  }
  let { entries, warnings } = parseReferences(text, input.format, input.path);
  return { ...input, references: entries.map(normalize), warnings };
}

/**
 * Loads every input in order. A file that fails with a {@link FormatError} is
 * left out of `sources` and reported in `failures`.
 */
export function loadSources(
  inputs: Array<Input>,
): { sources: Array<Source>; failures: Array<FormatError> } {
  let sources: Array<Source> = [];
  let failures: Array<FormatError> = [];
  for (let input of inputs) {
    try {
      sources.push(readSource(input));
    } catch (error) {
      if (!(error instanceof FormatError)) throw error;
      failures.push(error);
    }
  }
  return { sources, failures };
}

/** Writes `text` to `file`, creating parent directories. Throws {@link OutputError}. */
export function writeOutput(file: string, text: string) {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, text);
  } catch (error) {
    throw new OutputError(file, { cause: error });
  }
}
