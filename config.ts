import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "./errors.ts";

let TEMPLATES_DIR = fileURLToPath(new URL("./templates/", import.meta.url));
export let DEFAULT_PAGE_TEMPLATE = path.join(TEMPLATES_DIR, "md_template.hbs");
export let DEFAULT_LIST_TEMPLATE = path.join(
  TEMPLATES_DIR,
  "html_papers_list.hbs",
);

/** An optional string that is transformed to undefined if it is an empty string. */
let maybeStringSchema = z
  .string()
  .transform((v) => v === "" ? undefined : v)
  .optional();

let configSchema = z.object({
  /** `.bib`/`.ris` files or directories holding them. */
  inputs: z.string().min(1).array().min(1),
  includeAbstract: z.boolean().default(false),
  templatePath: z.string().min(1).default(DEFAULT_PAGE_TEMPLATE),
  outputDir: z.string().min(1),
  htmlTemplatePath: maybeStringSchema,
  htmlOutput: maybeStringSchema,
  combinedBib: maybeStringSchema,
  combinedRis: maybeStringSchema,
  allToBib: maybeStringSchema,
}).refine((config) => !config.htmlTemplatePath || config.htmlOutput, {
  message: "htmlTemplatePath is set but htmlOutput is not",
  path: ["htmlOutput"],
});

export type BatchConfig = z.output<typeof configSchema>;

function formatIssues(error: z.ZodError) {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validates a configuration object. Relative paths are resolved against
 * `baseDir`.
 */
export function parseConfig(value: unknown, baseDir = "."): BatchConfig {
  let result = configSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  let resolve = (p: string) => path.resolve(baseDir, p);
  let maybe = (p: string | undefined) => p === undefined ? undefined : resolve(p);
  let config = result.data;
  return {
    ...config,
    inputs: config.inputs.map(resolve),
    templatePath: resolve(config.templatePath),
    outputDir: resolve(config.outputDir),
    htmlTemplatePath: maybe(config.htmlTemplatePath),
    htmlOutput: maybe(config.htmlOutput),
    combinedBib: maybe(config.combinedBib),
    combinedRis: maybe(config.combinedRis),
    allToBib: maybe(config.allToBib),
  };
}

/** Reads a JSON configuration file; paths in it are relative to the file. */
export function loadConfig(file: string): BatchConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (error) {
    let reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot load configuration ${file}: ${reason}`, {
      cause: error,
    });
  }
  return parseConfig(raw, path.dirname(file));
}
