import { emptyReference, type Field, type RawEntry, type Reference } from "./record.ts";

let BIBTEX_VENUE_FIELDS = [
  "journal",
  "booktitle",
  "school",
  "institution",
  "howpublished",
];

let RIS_TITLE_TAGS = ["TI", "T1"];
let RIS_AUTHOR_TAGS = new Set(["AU", "A1"]);
let RIS_VENUE_TAGS = ["JO", "JF", "T2", "JA", "J1", "J2", "BT"];
let RIS_DATE_TAGS = ["PY", "Y1", "DA"];

let MONTHS = [
  "jan",
  "feb",
  "mar",
  "apr",
  "may",
  "jun",
  "jul",
  "aug",
  "sep",
  "oct",
  "nov",
  "dec",
];

/**
 * Hands out the fields of one raw entry. Whatever is never taken ends up in
 * the reference's passthrough bucket, in source order.
 */
function fieldPool(fields: Array<Field>) {
  let taken = new Set<Field>();
  let find = (name: string) =>
    fields.find((field) => field.name === name && !taken.has(field));
  return {
    find,
    take(field: Field) {
      taken.add(field);
      return field.value;
    },
    /** Takes the first present of `names`, in priority order. */
    first(names: Array<string>): Field | undefined {
      for (let name of names) {
        let field = find(name);
        if (field) {
          taken.add(field);
          return field;
        }
      }
      return undefined;
    },
    all(predicate: (field: Field) => boolean) {
      let matched = fields.filter((f) => predicate(f) && !taken.has(f));
      for (let field of matched) taken.add(field);
      return matched.map((field) => field.value);
    },
    rest() {
      return fields
        .filter((field) => !taken.has(field))
        .map((field) => ({ ...field }));
    },
  };
}

/** Removes grouping braces (but not `\{`) and collapses whitespace. */
export function cleanValue(value: string) {
  return value.replace(/(?<!\\)[{}]/g, "").replace(/\s+/g, " ").trim();
}

/** Splits `value` on `separator` wherever it sits outside of braces. */
function splitTopLevel(value: string, separator: RegExp) {
  let sticky = new RegExp(separator.source, "iy");
  let parts: Array<string> = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < value.length; i++) {
    let ch = value[i];
    if (ch === "{") depth += 1;
    else if (ch === "}") depth -= 1;
    else if (depth === 0) {
      sticky.lastIndex = i;
      let match = sticky.exec(value);
      if (match) {
        parts.push(value.slice(start, i));
        i += match[0].length - 1;
        start = i + 1;
      }
    }
  }
  parts.push(value.slice(start));
  return parts.map((part) => part.trim()).filter(Boolean);
}

/**
 * Splits a BibTeX name list on `and` and turns each `Last, First` (or
 * `Last, Jr, First`) into `First Last` (`First Last Jr`). Only top-level
 * commas count, so `{Barnes and Noble}, Jr, Ann` reads as family name
 * `Barnes and Noble` and becomes `Ann Barnes and Noble Jr`. Names without a
 * top-level comma, including brace-protected ones, are kept as written.
 */
export function splitBibtexNames(value: string): Array<string> {
  return splitTopLevel(value, /\s+and\s+/).map((name) => {
    let parts = splitTopLevel(name, /,/).map(cleanValue);
    if (parts.length === 2) return `${parts[1]} ${parts[0]}`.trim();
    if (parts.length >= 3) return `${parts[2]} ${parts[0]} ${parts[1]}`.trim();
    return cleanValue(name);
  });
}

/** `"3"`, `"03"`, `"mar"`, `"March"` → `"03"`; anything else → `""`. */
export function parseMonth(value: string) {
  let text = value.trim().toLowerCase();
  let number = /^\d{1,2}$/.test(text)
    ? Number(text)
    : MONTHS.indexOf(text.slice(0, 3)) + 1;
  return number >= 1 && number <= 12 ? String(number).padStart(2, "0") : "";
}

/** Reads `YYYY`, `YYYY-MM-DD` or RIS `YYYY/MM/DD/other` dates. */
function parseDate(value: string) {
  let match = /^(\d{4})(?:[/-](\d{1,2}))?/.exec(value.trim());
  if (!match) return { year: value.trim(), month: "" };
  return { year: match[1], month: match[2] ? parseMonth(match[2]) : "" };
}

function normalizeBibtex(entry: RawEntry): Reference {
  let ref = emptyReference("bibtex", entry.type, entry.key);
  let pool = fieldPool(entry.fields);
  let text = (name: string) => {
    let field = pool.first([name]);
    return field ? cleanValue(field.value) : "";
  };

  ref.title = text("title");
  let author = pool.first(["author"]);
  ref.authors = author ? splitBibtexNames(author.value) : [];
  let venue = pool.first(BIBTEX_VENUE_FIELDS);
  if (venue) {
    ref.venue = cleanValue(venue.value);
    ref.venueField = venue.name;
  }

  let year = pool.find("year");
  let date = year ? undefined : pool.find("date");
  if (year) {
    ref.year = cleanValue(pool.take(year));
  } else if (date) {
    let parsed = parseDate(cleanValue(pool.take(date)));
    ref.year = parsed.year;
    ref.month = parsed.month;
  }
  let month = pool.find("month");
  if (month && !ref.month && parseMonth(cleanValue(month.value))) {
    ref.month = parseMonth(cleanValue(pool.take(month)));
  }

  ref.volume = text("volume");
  ref.number = text("number");
  ref.pages = text("pages");
  ref.abstract = text("abstract");
  ref.url = text("url");
  ref.doi = text("doi");
  ref.extra = pool.rest();
  return ref;
}

function normalizeRis(entry: RawEntry): Reference {
  let ref = emptyReference("ris", entry.type, entry.key);
  let pool = fieldPool(entry.fields);
  let text = (...tags: Array<string>) => pool.first(tags)?.value ?? "";

  pool.first(["ID"]);
  ref.title = text(...RIS_TITLE_TAGS);
  ref.authors = pool.all((field) => RIS_AUTHOR_TAGS.has(field.name));
  let venue = pool.first(RIS_VENUE_TAGS);
  if (venue) {
    ref.venue = venue.value;
    ref.venueField = venue.name;
  }

  let date = pool.first(RIS_DATE_TAGS);
  if (date) {
    let parsed = parseDate(date.value);
    ref.year = parsed.year;
    ref.month = parsed.month;
  }
  let fullDate = pool.find("DA");
  if (!ref.month && fullDate && parseDate(fullDate.value).month) {
    ref.month = parseDate(pool.take(fullDate)).month;
  }

  ref.volume = text("VL");
  ref.number = text("IS", "CP");
  let start = text("SP");
  let end = text("EP");
  ref.pages = start && end ? `${start}--${end}` : start || end;
  ref.abstract = text("AB", "N2");
  ref.url = text("UR");
  ref.doi = text("DO");
  ref.extra = pool.rest();
  return ref;
}

/**
 * Maps a raw entry onto the canonical field set.
 *
 * Only the first occurrence of a canonical field is consumed; repeats and
 * unknown fields stay in `extra`. The result depends on nothing but `entry`.
 */
export function normalize(entry: RawEntry): Reference {
  return entry.format === "bibtex"
    ? normalizeBibtex(entry)
    : normalizeRis(entry);
}
