export type DocDeltaErrorCode =
  | "PATH_SYNTAX"
  | "PATH_UNRESOLVED"
  | "DOCUMENT_INVALID"
  | "DIFF_FORMAT"
  | "DOCUMENT_LOAD"
  | "DOCUMENT_WRITE"
  | "EXCLUSION_LIST"
  | "USAGE";

export class DocDeltaError extends Error {
  readonly code: DocDeltaErrorCode;

  constructor(code: DocDeltaErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocDeltaError";
    this.code = code;
  }
}

export class PathSyntaxError extends DocDeltaError {
  readonly input: string;
  readonly offset: number;

  constructor(input: string, offset: number, reason: string) {
    super("PATH_SYNTAX", `Invalid path "${input}" at offset ${offset}: ${reason}`);
    this.name = "PathSyntaxError";
    this.input = input;
    this.offset = offset;
  }
}

export class PathResolutionError extends DocDeltaError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super("PATH_UNRESOLVED", `Cannot resolve ${path}: ${reason}`);
    this.name = "PathResolutionError";
    this.path = path;
  }
}

export class DocumentValidationError extends DocDeltaError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super("DOCUMENT_INVALID", `Invalid document value at ${path}: ${reason}`);
    this.name = "DocumentValidationError";
    this.path = path;
  }
}

export class DiffFormatError extends DocDeltaError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("DIFF_FORMAT", issues.length ? `${message}: ${issues.join(", ")}` : message);
    this.name = "DiffFormatError";
    this.issues = issues;
  }
}

export interface SourceLocation {
  line: number;
  column: number;
}

export class DocumentLoadError extends DocDeltaError {
  readonly filePath: string;
  readonly location?: SourceLocation;

  constructor(
    filePath: string,
    reason: string,
    opts: { location?: SourceLocation; cause?: unknown } = {},
  ) {
    const where = opts.location ? ` at line ${opts.location.line}, column ${opts.location.column}` : "";
    super("DOCUMENT_LOAD", `Cannot load '${filePath}'${where}: ${reason}`, { cause: opts.cause });
    this.name = "DocumentLoadError";
    this.filePath = filePath;
    this.location = opts.location;
  }
}

export class DocumentWriteError extends DocDeltaError {
  readonly filePath: string;

  constructor(filePath: string, reason: string, opts: { cause?: unknown } = {}) {
    super("DOCUMENT_WRITE", `Cannot write '${filePath}': ${reason}`, { cause: opts.cause });
    this.name = "DocumentWriteError";
    this.filePath = filePath;
  }
}

export class ExclusionListError extends DocDeltaError {
  constructor(message: string) {
    super("EXCLUSION_LIST", message);
    this.name = "ExclusionListError";
  }
}

export class UsageError extends DocDeltaError {
  constructor(message: string) {
    super("USAGE", message);
    this.name = "UsageError";
  }
}
