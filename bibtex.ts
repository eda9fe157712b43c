import { FormatError, ParseWarning } from "./errors.ts";
import type { Field, RawEntry } from "./record.ts";

export type ParseResult = {
  entries: Array<RawEntry>;
  warnings: Array<ParseWarning>;
};

/** Blocks that carry no reference and are dropped without a warning. */
let SKIPPED_BLOCKS = new Set(["comment", "preamble", "string"]);

/** Where the parser looks for an entry: an `@` at the start of a line. */
let ENTRY_START = /^[ \t]*@/gm;

class EntrySyntaxError extends Error {}

/** A cursor over the document text. */
class EntryScanner {
  #text: string;
  #pos: number;

  constructor(text: string, pos = 0) {
    this.#text = text;
    this.#pos = pos;
  }

  get position() {
    return this.#pos;
  }

  get done() {
    return this.#pos >= this.#text.length;
  }

  peek() {
    return this.#text[this.#pos] ?? "";
  }

  next() {
    let ch = this.peek();
    this.#pos += 1;
    return ch;
  }

  skipWhitespace() {
    while (!this.done && /\s/.test(this.peek())) this.#pos += 1;
  }

  readWhile(pattern: RegExp) {
    let start = this.#pos;
    while (!this.done && pattern.test(this.peek())) this.#pos += 1;
    return this.#text.slice(start, this.#pos);
  }

  /** Reads the body of a `{...}` group; the opening brace is consumed. */
  readBraced() {
    let out = "";
    let depth = 1;
    while (!this.done) {
      let ch = this.next();
      if (ch === "\\") {
        out += ch + this.next();
        continue;
      }
      if (ch === "{") depth += 1;
      if (ch === "}") {
        depth -= 1;
        if (depth === 0) return out;
      }
      out += ch;
    }
    throw new EntrySyntaxError("unterminated braces");
  }

  /** Reads the body of a `"..."` value; braces may protect inner quotes. */
  readQuoted() {
    let out = "";
    let depth = 0;
    while (!this.done) {
      let ch = this.next();
      if (ch === "\\") {
        out += ch + this.next();
        continue;
      }
      if (ch === '"' && depth === 0) return out;
      if (ch === "{") depth += 1;
      if (ch === "}") depth -= 1;
      out += ch;
    }
    throw new EntrySyntaxError("unterminated quoted value");
  }
}

function collapseWhitespace(value: string) {
  return value.replace(/\s+/g, " ").trim();
}

function readValue(scanner: EntryScanner, field: string) {
  let parts: Array<string> = [];
  while (true) {
    scanner.skipWhitespace();
    let ch = scanner.peek();
    if (ch === "{") {
      scanner.next();
      parts.push(scanner.readBraced());
    } else if (ch === '"') {
      scanner.next();
      parts.push(scanner.readQuoted());
    } else {
      let bare = scanner.readWhile(/[^,#\s{}"()]/);
      if (!bare) {
        throw new EntrySyntaxError(`field "${field}" has no value`);
      }
      parts.push(bare);
    }
    scanner.skipWhitespace();
    if (scanner.peek() !== "#") break;
    scanner.next();
  }
  return collapseWhitespace(parts.join(""));
}

/** Steps over the body of a skipped block when it is brace-delimited. */
function skipBlock(scanner: EntryScanner) {
  scanner.skipWhitespace();
  if (scanner.peek() !== "{") return;
  scanner.next();
  scanner.readBraced();
}

/**
 * Parses one entry from the `@` the scanner sits on up to its closing
 * delimiter. Returns undefined for `@comment`, `@preamble` and `@string`
 * blocks.
 */
function parseEntry(scanner: EntryScanner, line: number): RawEntry | undefined {
  scanner.next();
  let type = scanner.readWhile(/[A-Za-z0-9_:-]/).toLowerCase();
  if (!type) throw new EntrySyntaxError("missing entry type");
  if (SKIPPED_BLOCKS.has(type)) {
    skipBlock(scanner);
    return undefined;
  }
  scanner.skipWhitespace();
  let open = scanner.next();
  if (open !== "{" && open !== "(") {
    throw new EntrySyntaxError(`expected "{" after @${type}`);
  }
  let close = open === "{" ? "}" : ")";

  scanner.skipWhitespace();
  let key = scanner.readWhile(/[^,\s{}()]/);
  if (!key) throw new EntrySyntaxError("missing citation key");
  scanner.skipWhitespace();

  let fields: Array<Field> = [];
  let entry: RawEntry = { format: "bibtex", type, key, fields, line };
  let ch = scanner.next();
  if (ch === close) return entry;
  if (ch !== ",") {
    throw new EntrySyntaxError(
      scanner.done
        ? "unterminated entry"
        : `expected "," after citation key "${key}"`,
    );
  }

  while (true) {
    scanner.skipWhitespace();
    if (scanner.done) throw new EntrySyntaxError("unterminated entry");
    if (scanner.peek() === close) {
      scanner.next();
      return entry;
    }
    let name = scanner.readWhile(/[A-Za-z0-9_.:+/-]/).toLowerCase();
    if (!name) {
      throw new EntrySyntaxError(`unexpected "${scanner.peek()}" in entry`);
    }
    scanner.skipWhitespace();
    if (scanner.next() !== "=") {
      throw new EntrySyntaxError(`field "${name}" has no "="`);
    }
    fields.push({ name, value: readValue(scanner, name) });
    scanner.skipWhitespace();
    let separator = scanner.next();
    if (separator === ",") continue;
    if (separator === close) return entry;
    throw new EntrySyntaxError(
      separator === ""
        ? "unterminated entry"
        : `expected "," or "${close}" after field "${name}"`,
    );
  }
}

/** Line numbers for offsets that only ever move forward. */
function lineCounter(text: string) {
  let offset = 0;
  let line = 1;
  return (index: number) => {
    for (; offset < index; offset++) {
      if (text[offset] === "\n") line += 1;
    }
    return line;
  };
}

/**
 * Parses a BibTeX document into raw entries, in source order.
 *
 * Each entry runs from its `@type{` header to the matching closing delimiter,
 * so values may span lines that start with `@`. A malformed entry becomes a
 * {@link ParseWarning} and parsing resumes at the next line that starts with
 * `@`. Text with content but no usable entry raises a {@link FormatError}
 * naming `source`.
 */
export function parseBibtex(text: string, source: string): ParseResult {
  let input = text.replace(/^\uFEFF/, "");
  let entries: Array<RawEntry> = [];
  let warnings: Array<ParseWarning> = [];
  let lineAt = lineCounter(input);
  let headers = new RegExp(ENTRY_START);
  let found = 0;

  for (let match = headers.exec(input); match; match = headers.exec(input)) {
    found += 1;
    let start = match.index + match[0].length - 1;
    let line = lineAt(start);
    let scanner = new EntryScanner(input, start);
    try {
      let entry = parseEntry(scanner, line);
      if (entry) entries.push(entry);
      headers.lastIndex = Math.max(scanner.position, start + 1);
    } catch (error) {
      if (!(error instanceof EntrySyntaxError)) throw error;
      warnings.push(new ParseWarning(source, line, error.message));
      headers.lastIndex = start + 1;
    }
  }

  if (entries.length === 0 && input.trim() !== "") {
    if (warnings.length > 0) {
      throw new FormatError(
        source,
        `no valid BibTeX entries (${warnings.length} malformed)`,
        { warnings },
      );
    }
    if (found === 0) {
      throw new FormatError(source, "no BibTeX entries found");
    }
  }
  return { entries, warnings };
}
