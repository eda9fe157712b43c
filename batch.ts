import * as path from "node:path";
import { writeAggregates } from "./aggregate.ts";
import { type BatchConfig, DEFAULT_LIST_TEMPLATE } from "./config.ts";
import { FormatError, ParseWarning, TemplateError } from "./errors.ts";
import { loadSources, resolveInputs, type Source, writeOutput } from "./files.ts";
import { loadRenderer, type Renderer } from "./render.ts";

export type SkipKind = "format" | "parse" | "template";

/** Something the batch left out, and why. */
export type Skipped = {
  kind: SkipKind;
  source: string;
  key?: string;
  line?: number;
  reason: string;
};

export type BatchSummary = {
  files: number;
  parsed: number;
  rendered: number;
  written: Array<string>;
  skipped: Array<Skipped>;
};

export function toSkipped(
  error: FormatError | ParseWarning | TemplateError,
  source: string,
): Skipped {
  if (error instanceof ParseWarning) {
    return {
      kind: "parse",
      source: error.source,
      line: error.line,
      reason: error.reason,
    };
  }
  if (error instanceof FormatError) {
    return {
      kind: "format",
      source: error.source,
      reason: error.reason,
    };
  }
  return { kind: "template", source, key: error.key, reason: error.message };
}

/** Skips collected while loading: every file failure and malformed entry. */
export function loadSkipped(
  sources: Array<Source>,
  failures: Array<FormatError>,
): Array<Skipped> {
  return [
    ...failures.flatMap((failure) => [
      toSkipped(failure, failure.source),
      ...failure.warnings.map((w) => toSkipped(w, w.source)),
    ]),
    ...sources.flatMap((source) =>
      source.warnings.map((w) => toSkipped(w, source.path))
    ),
  ];
}

/**
 * Renders one markdown page per reference into `outputDir`. A page whose
 * template fails is skipped; a slug shared by two references is written twice
 * and the later reference wins.
 */
export function renderPages(
  sources: Array<Source>,
  renderer: Renderer,
  outputDir: string,
): { written: Array<string>; skipped: Array<Skipped> } {
  let written: Array<string> = [];
  let skipped: Array<Skipped> = [];
  for (let source of sources) {
    for (let ref of source.references) {
      let text: string;
      try {
        text = renderer.render(ref);
      } catch (error) {
        if (!(error instanceof TemplateError)) throw error;
        skipped.push(toSkipped(error, source.path));
        continue;
      }
      let file = path.join(outputDir, renderer.context(ref).filename);
      writeOutput(file, text);
      written.push(file);
    }
  }
  return { written, skipped };
}

/** Renders the listing of every reference into one HTML file. */
export function renderListing(
  sources: Array<Source>,
  renderer: Renderer,
  output: string,
): { written: Array<string>; skipped: Array<Skipped> } {
  let refs = sources.flatMap((source) => source.references);
  try {
    writeOutput(output, renderer.renderList(refs));
  } catch (error) {
    if (!(error instanceof TemplateError)) throw error;
    return { written: [], skipped: [toSkipped(error, output)] };
  }
  return { written: [output], skipped: [] };
}

/** Compiles the page template and, when a listing is requested, the listing one. */
export function loadRenderers(config: BatchConfig) {
  let page = loadRenderer(config.templatePath, {
    includeAbstract: config.includeAbstract,
  });
  let list = config.htmlOutput
    ? loadRenderer(config.htmlTemplatePath ?? DEFAULT_LIST_TEMPLATE, {
      includeAbstract: config.includeAbstract,
      escapeHtml: true,
    })
    : undefined;
  return { page, list };
}

/**
 * Runs one conversion: pages, the optional HTML listing and the optional
 * combined reference files.
 *
 * Templates are compiled before anything is written. Per-file and per-entry
 * problems end up in `skipped`; an {@link OutputError} stops the batch.
 */
export function runBatch(config: BatchConfig): BatchSummary {
  let renderers = loadRenderers(config);
  let inputs = resolveInputs(config.inputs);
  let { sources, failures } = loadSources(inputs);
  let skipped = loadSkipped(sources, failures);
  let written: Array<string> = [];

  let pages = renderPages(sources, renderers.page, config.outputDir);
  written.push(...pages.written);
  skipped.push(...pages.skipped);

  if (renderers.list && config.htmlOutput) {
    let listing = renderListing(sources, renderers.list, config.htmlOutput);
    written.push(...listing.written);
    skipped.push(...listing.skipped);
  }

  let aggregates = writeAggregates(sources, {
    bib: config.combinedBib,
    ris: config.combinedRis,
    allToBib: config.allToBib,
  });
  written.push(...aggregates.map((a) => a.path));

  return {
    files: inputs.length,
    parsed: sources.reduce((n, s) => n + s.references.length, 0),
    rendered: pages.written.length,
    written,
    skipped,
  };
}
