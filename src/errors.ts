export type ErrorCode =
  | "SCHEMA_INVALID"
  | "DECOMPOSITION_FAILED"
  | "ANALYSIS_FAILED"
  | "EXECUTION_FAILED"
  | "PROVIDER_FAILED"
  | "SEARCH_FAILED"
  | "CONFIG_INVALID";

/** Base class for every error the research pipeline raises on purpose. */
export class ResearchError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Model output had no fenced block, did not parse, or failed its schema. */
export class SchemaError extends ResearchError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super("SCHEMA_INVALID", message, options);
    this.issues = issues;
  }
}

export class DecompositionError extends ResearchError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super("DECOMPOSITION_FAILED", message, options);
    this.issues = issues;
  }
}

export class AnalysisError extends ResearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ANALYSIS_FAILED", message, options);
  }
}

export class ExecutionError extends ResearchError {
  /** URLs that were published before the failure, if any. */
  readonly partialUrls: string[];
  readonly generatedCode?: string;

  constructor(
    message: string,
    opts: { partialUrls?: string[]; generatedCode?: string; cause?: unknown } = {},
  ) {
    super("EXECUTION_FAILED", message, { cause: opts.cause });
    this.partialUrls = opts.partialUrls ?? [];
    this.generatedCode = opts.generatedCode;
  }
}

export class ProviderError extends ResearchError {
  readonly provider: string;
  readonly status?: number;
  readonly retryable: boolean;

  constructor(
    provider: string,
    message: string,
    opts: { status?: number; retryable?: boolean; cause?: unknown } = {},
  ) {
    super("PROVIDER_FAILED", `[${provider}] ${message}`, { cause: opts.cause });
    this.provider = provider;
    this.status = opts.status;
    this.retryable = opts.retryable ?? isRetryableStatus(opts.status);
  }
}

export class SearchError extends ResearchError {
  readonly term: string;

  constructor(term: string, message: string, options?: { cause?: unknown }) {
    super("SEARCH_FAILED", message, options);
    this.term = term;
  }
}

export class ConfigError extends ResearchError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

/** No status means the request never got an answer (network, DNS, abort). */
function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return true;
  return status === 408 || status === 429 || status >= 500;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
