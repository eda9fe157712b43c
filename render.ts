import * as fs from "node:fs";
import Handlebars from "handlebars";
import { stringify } from "yaml";
import { ConfigError, TemplateError } from "./errors.ts";
import type { Reference } from "./record.ts";
import { bibtexType } from "./serialize.ts";

/** The values a page template can use for one reference. */
export type TemplateContext = {
  key: string;
  type: string;
  title: string;
  authors: Array<string>;
  authors_list: string;
  year: string;
  month: string;
  date: string;
  venue: string;
  volume: string;
  number: string;
  pages: string;
  doi: string;
  abstract: string;
  excerpt: string;
  url: string;
  paperurl: string;
  slug: string;
  filename: string;
  permalink: string;
  citation: string;
  /** Front-matter values as quoted YAML scalars: `title: {{yaml.title}}`. */
  yaml: YamlFields;
};

type YamlFields = Record<
  "title" | "authors_list" | "venue" | "excerpt" | "paperurl" | "citation",
  string
>;

export type ListContext = { papers: Array<TemplateContext>; count: number };

export type RendererOptions = {
  source: string;
  /** Shown in errors, usually the template path. */
  name?: string;
  includeAbstract: boolean;
  /** HTML-escape `{{values}}`; off for markdown templates. */
  escapeHtml?: boolean;
};

export type Renderer = {
  context(ref: Reference): TemplateContext;
  render(ref: Reference): string;
  renderList(refs: Array<Reference>): string;
};

type Author = { kind: "human"; given: string; family: string } | {
  kind: "consortium";
  name: string;
};

/**
 * `Smith, John` → `John Smith` and `King, Martin, Jr.` → `Martin King Jr.`;
 * other names are returned as is.
 */
export function displayName(name: string) {
  let parts = name.split(",").map((part) => part.trim());
  if (parts.length === 1) return name.trim();
  let [family, given, ...suffix] = parts;
  return [given, family, ...suffix].filter(Boolean).join(" ");
}

function isNetworkOrConsortium(name: string) {
  let test = name.toLowerCase();
  return test.includes("network") || test.includes("consortium");
}

function processAuthor(name: string): Author {
  let parts = displayName(name).split(/\s+/);
  let family = parts.pop() ?? "";
  if (parts.length === 0 || isNetworkOrConsortium(name)) {
    return { kind: "consortium", name: displayName(name) };
  }
  return { kind: "human", given: parts.join(" "), family };
}

function formatGiven(given: string) {
  let initials = given.match(/[A-Z]/g);
  return initials?.join("") ?? "";
}

function formatAuthor(author: Author) {
  if (author.kind === "consortium") {
    return author.name;
  }
  let initials = formatGiven(author.given);
  return initials ? `${initials} ${author.family}` : author.family;
}

export function formatAuthors(authors: Array<string>) {
  let fmt = authors.map(processAuthor).map(formatAuthor);
  if (fmt.length === 2) return fmt.join(" and ");
  return fmt.join(", ");
}

function formatPublished(ref: Reference) {
  if (ref.venue) {
    let published = ref.venue;
    if (ref.volume) published += ` ${ref.volume}`;
    if (ref.number) published += `(${ref.number})`;
    if (ref.pages) {
      published += `${(ref.number || ref.volume) ? ":" : " "}${ref.pages}`;
    }
    return published;
  }
  // no venue, check the url for a preprint server
  let url = ref.url.toLowerCase();
  if (url.includes("arxiv")) return "arXiv";
  if (url.includes("biorxiv")) return "bioRxiv";
  if (url.includes("medrxiv")) return "medRxiv";
  if (url.includes("osf.io")) return "OSF Preprints";
  if (url.includes("ssrn")) return "SSRN Preprints";
  return "";
}

/** `Authors, "Title", Venue Vol(No):Pages (Year).`, unescaped. */
export function formatCitation(ref: Reference) {
  let citation = [
    formatAuthors(ref.authors),
    `"${ref.title}"`,
    formatPublished(ref),
  ].filter(Boolean).join(", ");
  return ref.year ? `${citation} (${ref.year}).` : `${citation}.`;
}

/**
 * A filesystem-safe file stem from the year and title:
 * `2024-An-Innovative-Approach`. Distinct references can share a slug.
 */
export function slugify(year: string, title: string) {
  let stem = (title || "Untitled")
    .replace(/[\\/:*?"<>|{}#%]/g, "")
    .trim()
    .replace(/\s+/g, "-");
  return year ? `${year}-${stem}` : stem;
}

/** A double-quoted YAML scalar on a single line. */
export function yamlScalar(value: string) {
  return stringify(value, {
    defaultStringType: "QUOTE_DOUBLE",
    doubleQuotedMinMultiLineLength: Number.POSITIVE_INFINITY,
    lineWidth: 0,
  }).trimEnd();
}

export function buildContext(
  ref: Reference,
  includeAbstract: boolean,
): TemplateContext {
  let slug = slugify(ref.year, ref.title);
  let authors = ref.authors.map(displayName);
  let link = ref.url || (ref.doi ? `https://doi.org/${ref.doi}` : "");
  let abstract = includeAbstract ? ref.abstract : "";
  let date = ref.year ? `${ref.year}-${ref.month || "01"}-01` : "";
  let paperurl = includeAbstract ? link : "";
  let citation = Handlebars.escapeExpression(formatCitation(ref));
  return {
    key: ref.key,
    type: bibtexType(ref),
    title: ref.title,
    authors,
    authors_list: authors.join(", "),
    year: ref.year,
    month: ref.month,
    date,
    venue: ref.venue,
    volume: ref.volume,
    number: ref.number,
    pages: ref.pages,
    doi: ref.doi,
    abstract,
    excerpt: abstract,
    url: ref.url,
    paperurl,
    slug,
    filename: `${slug}.md`,
    permalink: slug,
    citation,
    yaml: {
      title: yamlScalar(ref.title),
      authors_list: yamlScalar(authors.join(", ")),
      venue: yamlScalar(ref.venue),
      excerpt: yamlScalar(abstract),
      paperurl: yamlScalar(paperurl),
      citation: yamlScalar(citation),
    },
  };
}

/** Newest first; references without a year go last. */
function byYearDescending(a: TemplateContext, b: TemplateContext) {
  let year = (c: TemplateContext) => {
    let parsed = Number.parseInt(c.year, 10);
    return Number.isNaN(parsed) ? -1 : parsed;
  };
  return year(b) - year(a);
}

/** The field a strict-mode Handlebars error complains about. */
function missingField(error: unknown) {
  if (!(error instanceof Error)) return undefined;
  let match = /^"([^"]+)" not defined in/.exec(error.message) ??
    /^Missing helper: "([^"]+)"/.exec(error.message);
  return match?.[1];
}

/**
 * Compiles a template in its own Handlebars environment.
 *
 * Templates run in strict mode: a `{{field}}` the context does not have throws
 * a {@link TemplateError} for that reference instead of rendering as empty.
 * Block helper arguments (`{{#if abstract}}`) are not checked.
 */
export function createRenderer(options: RendererOptions): Renderer {
  let name = options.name ?? "template";
  let env = Handlebars.create();
  try {
    env.parse(options.source);
  } catch (error) {
    let reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Template ${name} does not compile: ${reason}`, {
      cause: error,
    });
  }
  let template = env.compile<TemplateContext | ListContext>(options.source, {
    strict: true,
    noEscape: !options.escapeHtml,
  });

  let run = (data: TemplateContext | ListContext, key: string) => {
    try {
      return template(data);
    } catch (error) {
      let field = missingField(error);
      if (field === undefined) throw error;
      throw new TemplateError(field, key, { cause: error });
    }
  };

  let context = (ref: Reference) => buildContext(ref, options.includeAbstract);

  return {
    context,
    render: (ref) => run(context(ref), ref.key),
    renderList(refs) {
      let papers = refs.map(context).toSorted(byYearDescending);
      return run({ papers, count: papers.length }, name);
    },
  };
}

/** Reads a template file and compiles it. Throws {@link ConfigError}. */
export function loadRenderer(
  file: string,
  options: Omit<RendererOptions, "source" | "name">,
): Renderer {
  let source: string;
  try {
    source = fs.readFileSync(file, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read template ${file}`, { cause: error });
  }
  return createRenderer({ ...options, source, name: file });
}
