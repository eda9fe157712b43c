import { markdownTable } from "markdown-table";
import type { BatchSummary, Skipped } from "./batch.ts";

function plural(count: number, noun: string) {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/** Counts of parsed, rendered and skipped items, one per line. */
export function formatSummary(summary: BatchSummary) {
  return [
    `Parsed ${plural(summary.parsed, "reference")} from ${
      plural(summary.files, "file")
    }`,
    `Rendered ${plural(summary.rendered, "page")}`,
    `Skipped ${plural(summary.skipped.length, "item")}`,
  ].join("\n");
}

function location(skip: Skipped) {
  if (skip.key) return skip.key;
  if (skip.line !== undefined) return `line ${skip.line}`;
  return "";
}

/** A markdown table of everything the batch left out. */
export function formatSkipped(skipped: Array<Skipped>) {
  return markdownTable(
    [
      ["Kind", "Source", "Entry", "Reason"],
      ...skipped.map((skip) => [
        skip.kind,
        skip.source,
        location(skip),
        skip.reason,
      ]),
    ],
    { align: null, alignDelimiters: false },
  );
}
