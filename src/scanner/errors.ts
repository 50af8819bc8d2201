export class ScanError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or incomplete rule catalog. Fatal. */
export class CatalogError extends ScanError {
  constructor(
    message: string,
    readonly problems: readonly string[] = [],
  ) {
    super(problems.length > 0 ? `${message}: ${problems.join("; ")}` : message);
  }
}

export class ConfigError extends ScanError {}

export class RootPathError extends ScanError {
  constructor(
    readonly rootPath: string,
    reason: string,
  ) {
    super(`Cannot scan "${rootPath}": ${reason}`);
  }
}

/** A finding references a rule the catalog does not contain. */
export class ReportIntegrityError extends ScanError {}

export type LoadErrorKind = "ParseFailure" | "ReadFailure";

/** Per-file load failure. Recorded and reported, never thrown out of the loader. */
export class LoadError extends ScanError {
  constructor(
    readonly kind: LoadErrorKind,
    readonly path: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(reason, options);
  }
}

/** A rule predicate threw while evaluating one document. */
export class EvalError extends ScanError {
  constructor(
    readonly ruleId: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(`Rule ${ruleId} failed on ${path}: ${describeError(options?.cause)}`, options);
  }
}

export class TimeoutError extends ScanError {
  constructor(readonly skippedTasks: number) {
    super(`Evaluation deadline exceeded; ${skippedTasks} rule evaluation(s) skipped`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
