/**
 * Error hierarchy for a conversion batch.
 *
 * `FormatError`, `ParseWarning` and `TemplateError` are collected into the
 * batch summary and skip one file, entry or page respectively. `OutputError`
 * and `ConfigError` abort the batch.
 */
export class ConversionError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** One malformed entry in an otherwise readable file. */
export class ParseWarning extends ConversionError {
  readonly source: string;
  readonly line: number;
  readonly reason: string;

  constructor(source: string, line: number, reason: string) {
    super(`${source}:${line}: ${reason}`, "PARSE_WARNING");
    this.source = source;
    this.line = line;
    this.reason = reason;
  }
}

/** A file that cannot be read, or that yields no entries at all. */
export class FormatError extends ConversionError {
  readonly source: string;
  readonly reason: string;
  readonly warnings: Array<ParseWarning>;

  constructor(
    source: string,
    reason: string,
    options: { warnings?: Array<ParseWarning>; cause?: unknown } = {},
  ) {
    super(`${source}: ${reason}`, "FORMAT_ERROR", { cause: options.cause });
    this.source = source;
    this.reason = reason;
    this.warnings = options.warnings ?? [];
  }
}

/** A template referenced a field the reference does not provide. */
export class TemplateError extends ConversionError {
  readonly field: string;
  readonly key: string;

  constructor(field: string, key: string, options?: { cause?: unknown }) {
    super(
      `Template field "${field}" is not defined for reference "${key}"`,
      "TEMPLATE_ERROR",
      options,
    );
    this.field = field;
    this.key = key;
  }
}

/** An output destination could not be written. */
export class OutputError extends ConversionError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    let detail = options?.cause instanceof Error
      ? `: ${options.cause.message}`
      : "";
    super(`Cannot write ${path}${detail}`, "OUTPUT_ERROR", options);
    this.path = path;
  }
}

/** Invalid configuration, or a template that cannot be loaded. */
export class ConfigError extends ConversionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIG_ERROR", options);
  }
}
