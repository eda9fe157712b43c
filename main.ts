import * as path from "node:path";
import { pathToFileURL } from "node:url";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { type BatchSummary, runBatch } from "./batch.ts";
import { loadConfig } from "./config.ts";
import { ConversionError } from "./errors.ts";
import { formatSkipped, formatSummary } from "./report.ts";

function main() {
  let configPath = process.argv[2] ?? "./bib2md.config.json";

  p.intro("bib2md");
  let config = loadConfig(configPath);
  p.log.info(
    `Converting ${chalk.cyan(config.inputs.length.toString())} inputs into ${
      chalk.cyan(path.relative(process.cwd(), config.outputDir) || ".")
    }`,
  );

  let spinner = p.spinner();
  spinner.start(chalk.bold("Rendering references"));
  let summary: BatchSummary;
  try {
    summary = runBatch(config);
  } catch (error) {
    spinner.stop("Conversion aborted", 1);
    throw error;
  }
  spinner.stop(
    `Rendered ${chalk.yellow(summary.rendered.toString())} of ${
      chalk.yellow(summary.parsed.toString())
    } references`,
  );

  for (let skip of summary.skipped) {
    p.log.warn(`${chalk.bold(skip.source)}: ${skip.reason}`);
  }
  if (summary.skipped.length > 0) {
    p.note(formatSkipped(summary.skipped), "Skipped");
  }
  p.note(formatSummary(summary), "Summary");
  p.outro("Done!");
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  try {
    main();
  } catch (error) {
    if (!(error instanceof ConversionError)) throw error;
    p.log.error(chalk.red(error.message));
    process.exitCode = 1;
  }
}
