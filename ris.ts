import type { ParseResult } from "./bibtex.ts";
import { FormatError, ParseWarning } from "./errors.ts";
import type { Field, RawEntry } from "./record.ts";

// RIS line format: `TY  - JOUR`. Two spaces before the dash are standard;
// exports with a single space are common enough to accept.
let TAG_LINE = /^([A-Z][A-Z0-9]) {1,2}-(?: (.*))?$/;

type OpenRecord = {
  line: number;
  type: string;
  fields: Array<Field>;
  problem?: string;
};

/** Derives a citation key for a record without an `ID` tag. */
function deriveKey(fields: Array<Field>, index: number) {
  let id = fields.find((f) => f.name === "ID")?.value;
  if (id) return id;
  let title = fields.find((f) => f.name === "TI" || f.name === "T1")?.value;
  if (title) return title.toLowerCase().replace(/\s+/g, "_").slice(0, 50);
  return `ris_entry_${index}`;
}

/**
 * Parses an RIS document into raw entries, in source order.
 *
 * Tag values are trimmed; untagged lines continue the previous tag's value.
 * Records that do not open with `TY` or are never closed by `ER` become
 * {@link ParseWarning}s.
 */
export function parseRis(text: string, source: string): ParseResult {
  let lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);
  let entries: Array<RawEntry> = [];
  let warnings: Array<ParseWarning> = [];
  let current: OpenRecord | undefined;

  let close = (record: OpenRecord) => {
    if (record.problem) {
      warnings.push(new ParseWarning(source, record.line, record.problem));
      return;
    }
    entries.push({
      format: "ris",
      type: record.type,
      key: deriveKey(record.fields, entries.length),
      fields: record.fields,
      line: record.line,
    });
  };

  for (let [i, raw] of lines.entries()) {
    let match = TAG_LINE.exec(raw.trimEnd());
    if (!match) {
      let last = current?.fields.at(-1);
      if (last && raw.trim()) {
        last.value = `${last.value} ${raw.trim()}`.trim();
      }
      continue;
    }
    let tag = match[1];
    let value = (match[2] ?? "").trim();

    if (tag === "TY") {
      if (current) {
        current.problem ??= "record is not terminated by ER";
        close(current);
      }
      current = { line: i + 1, type: value, fields: [] };
      if (!value) current.problem = "record has an empty TY tag";
      continue;
    }
    if (tag === "ER") {
      if (current) close(current);
      current = undefined;
      continue;
    }
    if (!current) {
      current = {
        line: i + 1,
        type: "",
        fields: [],
        problem: `record starts with ${tag} instead of TY`,
      };
    }
    current.fields.push({ name: tag, value });
  }

  if (current) {
    current.problem ??= "record is not terminated by ER";
    close(current);
  }

  if (entries.length === 0 && text.trim() !== "") {
    throw new FormatError(
      source,
      warnings.length > 0
        ? `no valid RIS records (${warnings.length} malformed)`
        : "no RIS records found",
      { warnings },
    );
  }
  return { entries, warnings };
}
