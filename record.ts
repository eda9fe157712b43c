export type ReferenceFormat = "bibtex" | "ris";

/** A field (or RIS tag) and its value, as read from the source. */
export type Field = { name: string; value: string };

/** One entry as the parser found it, before field names are mapped. */
export type RawEntry = {
  format: ReferenceFormat;
  type: string;
  key: string;
  fields: Array<Field>;
  /** 1-based line of the entry header in the source text. */
  line: number;
};

/**
 * A normalized bibliographic reference.
 *
 * Canonical fields default to the empty string. Source fields that have no
 * canonical slot are kept in `extra`, in source order, so that serializing a
 * reference does not lose data. `extra` is never exposed to templates.
 */
export type Reference = {
  format: ReferenceFormat;
  /** Native entry type: `article` for BibTeX, `JOUR` for RIS. */
  type: string;
  key: string;
  title: string;
  authors: Array<string>;
  venue: string;
  /** Field name or tag the venue was read from, `""` when there is none. */
  venueField: string;
  year: string;
  month: string;
  volume: string;
  number: string;
  pages: string;
  abstract: string;
  url: string;
  doi: string;
  extra: Array<Field>;
};

export let FORMAT_EXTENSIONS: Record<ReferenceFormat, string> = {
  bibtex: ".bib",
  ris: ".ris",
};

export function emptyReference(
  format: ReferenceFormat,
  type: string,
  key: string,
): Reference {
  return {
    format,
    type,
    key,
    title: "",
    authors: [],
    venue: "",
    venueField: "",
    year: "",
    month: "",
    volume: "",
    number: "",
    pages: "",
    abstract: "",
    url: "",
    doi: "",
    extra: [],
  };
}
