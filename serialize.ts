import { splitBibtexNames } from "./normalize.ts";
import type { Field, Reference, ReferenceFormat } from "./record.ts";

let RIS_TO_BIBTEX_TYPES: Record<string, string> = {
  JOUR: "article",
  BOOK: "book",
  CHAP: "inbook",
  CONF: "inproceedings",
  CPAPER: "inproceedings",
  THES: "phdthesis",
  RPRT: "techreport",
  UNPB: "unpublished",
};

let BIBTEX_TO_RIS_TYPES: Record<string, string> = {
  article: "JOUR",
  book: "BOOK",
  inbook: "CHAP",
  incollection: "CHAP",
  inproceedings: "CONF",
  conference: "CONF",
  phdthesis: "THES",
  mastersthesis: "THES",
  techreport: "RPRT",
  unpublished: "UNPB",
};

/** RIS tags that have a BibTeX field; every other passthrough tag is dropped. */
let RIS_TO_BIBTEX_FIELDS: Record<string, string> = {
  KW: "keywords",
  PB: "publisher",
  CY: "address",
  SN: "issn",
  ED: "editor",
  A2: "editor",
  N1: "note",
  LA: "language",
  ET: "edition",
};

let BIBTEX_TO_RIS_FIELDS: Record<string, string> = {
  keywords: "KW",
  publisher: "PB",
  address: "CY",
  issn: "SN",
  isbn: "SN",
  editor: "ED",
  note: "N1",
  language: "LA",
  edition: "ET",
};

/** Thesis tags that name the degree-granting institution and its place. */
let RIS_TO_BIBTEX_THESIS_FIELDS: Record<string, string> = {
  PB: "school",
  CY: "address",
};

/** How repeated RIS tags are joined into one BibTeX value, and split back. */
let LIST_SEPARATORS: Record<string, { join: string; split: RegExp }> = {
  keywords: { join: ", ", split: /\s*[,;]\s*/ },
  editor: { join: " and ", split: /\s+and\s+/i },
};

function isThesisPhd(ref: Reference) {
  let thesisType = ref.extra.find((f) => f.name === "M3")?.value ?? "";
  return /phd|doct|dissertation/i.test(thesisType);
}

/** The BibTeX entry type of a reference, whatever its source format. */
export function bibtexType(ref: Reference): string {
  if (ref.format === "bibtex") return ref.type;
  let type = ref.type.toUpperCase();
  if (type === "THES") return isThesisPhd(ref) ? "phdthesis" : "mastersthesis";
  return RIS_TO_BIBTEX_TYPES[type] ?? "misc";
}

/** The RIS reference type of a reference, whatever its source format. */
export function risType(ref: Reference): string {
  if (ref.format === "ris") return ref.type;
  return BIBTEX_TO_RIS_TYPES[ref.type] ?? "GEN";
}

function bibtexVenueField(ref: Reference, type: string) {
  if (ref.format === "bibtex" && ref.venueField) return ref.venueField;
  switch (type) {
    case "article":
      return "journal";
    case "inproceedings":
    case "incollection":
    case "inbook":
    case "conference":
      return "booktitle";
    case "phdthesis":
    case "mastersthesis":
      return "school";
    case "techreport":
      return "institution";
    default:
      return "howpublished";
  }
}

function risVenueTag(ref: Reference, type: string) {
  if (ref.format === "ris" && ref.venueField) return ref.venueField;
  return type === "JOUR" ? "JO" : "T2";
}

/** Escapes stray braces so that a value cannot close its own field early. */
function protectBraces(value: string) {
  let depth = 0;
  for (let ch of value.replace(/\\[{}]/g, "")) {
    if (ch === "{") depth += 1;
    if (ch === "}") depth -= 1;
    if (depth < 0) break;
  }
  return depth === 0 ? value : value.replace(/(?<!\\)([{}])/g, "\\$1");
}

/** RIS `Last, First, Suffix` is BibTeX `Last, Suffix, First`. */
function risNameToBibtex(name: string) {
  let parts = name.split(",").map((part) => part.trim());
  if (parts.length !== 3) return name;
  let [family, given, suffix] = parts;
  return `${family}, ${suffix}, ${given}`;
}

function formatBibtexName(ref: Reference, rawName: string) {
  let name = ref.format === "ris" ? risNameToBibtex(rawName) : rawName;
  // A comma in a BibTeX-sourced name was brace-protected in the source; in an
  // RIS name it separates the family name.
  let needsBraces = splitBibtexNames(name).length > 1 ||
    (ref.format === "bibtex" && name.includes(","));
  return needsBraces ? `{${name}}` : name;
}

function bibtexExtras(ref: Reference, type: string): Array<Field> {
  if (ref.format === "bibtex") return ref.extra;
  let thesis = type === "phdthesis" || type === "mastersthesis";
  // The venue already fills `school` when a thesis has one.
  let thesisFields: Record<string, string> = thesis && !ref.venue
    ? RIS_TO_BIBTEX_THESIS_FIELDS
    : {};
  let grouped = new Map<string, Array<string>>();
  for (let field of ref.extra) {
    let name = thesisFields[field.name] ?? RIS_TO_BIBTEX_FIELDS[field.name];
    if (!name) continue;
    grouped.set(name, [...(grouped.get(name) ?? []), field.value]);
  }
  let fields = Array.from(grouped, ([name, values]) => ({
    name,
    value: values.join(LIST_SEPARATORS[name]?.join ?? "; "),
  }));
  if (type === "phdthesis") fields.push({ name: "type", value: "PhD Thesis" });
  if (type === "mastersthesis") {
    fields.push({ name: "type", value: "Master's Thesis" });
  }
  return fields;
}

function risExtras(ref: Reference): Array<Field> {
  if (ref.format === "ris") return ref.extra;
  return ref.extra.flatMap((field) => {
    let tag = BIBTEX_TO_RIS_FIELDS[field.name];
    if (!tag) return [];
    let separator = LIST_SEPARATORS[field.name]?.split;
    let values = separator ? field.value.split(separator) : [field.value];
    return values.filter(Boolean).map((value) => ({ name: tag, value }));
  });
}

/**
 * Writes a reference as one BibTeX entry, one field per line.
 *
 * RIS references are converted on the way: the type and passthrough tags go
 * through fixed lookup tables, and tags without a BibTeX field are dropped.
 */
export function toBibtex(ref: Reference): string {
  let type = bibtexType(ref);
  let key = ref.key.replace(/[\s,{}()]+/g, "_");
  let fields: Array<Field> = [];
  let add = (name: string, value: string) => {
    if (value) fields.push({ name, value });
  };

  add("title", ref.title);
  add(
    "author",
    ref.authors.map((name) => formatBibtexName(ref, name)).join(" and "),
  );
  add(bibtexVenueField(ref, type), ref.venue);
  add("year", ref.year);
  add("month", ref.month);
  add("volume", ref.volume);
  add("number", ref.number);
  add("pages", ref.pages);
  add("doi", ref.doi);
  add("url", ref.url);
  add("abstract", ref.abstract);
  fields.push(...bibtexExtras(ref, type));

  let lines = fields.map(
    ({ name, value }) => `  ${name} = {${protectBraces(value)}},`,
  );
  return [`@${type}{${key},`, ...lines, "}"].join("\n");
}

/**
 * Writes a reference as one RIS record terminated by `ER  - `.
 *
 * BibTeX references are converted through the reverse lookup tables; fields
 * without an RIS tag are dropped.
 */
export function toRis(ref: Reference): string {
  let type = risType(ref);
  let lines: Array<string> = [];
  let add = (tag: string, value: string) => {
    if (value) lines.push(`${tag}  - ${value}`);
  };

  add("TY", type);
  add("ID", ref.key);
  add("TI", ref.title);
  for (let author of ref.authors) add("AU", author);
  add(risVenueTag(ref, type), ref.venue);
  add("PY", ref.year);
  if (ref.year && ref.month) add("DA", `${ref.year}/${ref.month}`);
  add("VL", ref.volume);
  add("IS", ref.number);
  let [start, end] = ref.pages.split(/-{2,}/);
  add("SP", ref.pages.includes("--") ? start : ref.pages);
  if (ref.pages.includes("--")) add("EP", end ?? "");
  add("AB", ref.abstract);
  add("UR", ref.url);
  add("DO", ref.doi);
  for (let { name, value } of risExtras(ref)) {
    lines.push(`${name}  - ${value}`.trimEnd());
  }
  lines.push("ER  - ");
  return lines.join("\n");
}

export function serialize(ref: Reference, format: ReferenceFormat): string {
  return format === "bibtex" ? toBibtex(ref) : toRis(ref);
}
