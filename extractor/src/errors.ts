export const ERROR_KINDS = [
  "InvalidURL",
  "ForbiddenHost",
  "Timeout",
  "TransportError",
  "TooLarge",
  "NoData",
  "UnparseablePrice",
  "ResourceExhausted",
  "PartialResultInsufficient"
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export class ExtractionError extends Error {
  readonly kind: ErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ExtractionError";
    this.kind = kind;
    if (details) {
      this.details = details;
    }
  }
}

export function isExtractionError(value: unknown): value is ExtractionError {
  return value instanceof ExtractionError;
}

export function isErrorKind(value: unknown, kind: ErrorKind): boolean {
  return isExtractionError(value) && value.kind === kind;
}

function isAbortError(error: Error): boolean {
  return error.name === "AbortError" || error.name === "TimeoutError";
}

/**
 * Folds anything thrown below the pipeline into one of the public kinds.
 * Abort/timeout errors from fetch or puppeteer become `Timeout`.
 */
export function toExtractionError(error: unknown, fallbackKind: ErrorKind = "TransportError"): ExtractionError {
  if (isExtractionError(error)) {
    return error;
  }
  if (error instanceof Error) {
    if (isAbortError(error)) {
      return new ExtractionError("Timeout", error.message || "operation aborted");
    }
    return new ExtractionError(fallbackKind, error.message, { cause: error.name });
  }
  return new ExtractionError(fallbackKind, typeof error === "string" ? error : "unknown failure");
}

const HTTP_STATUS: Record<ErrorKind, number> = {
  InvalidURL: 400,
  ForbiddenHost: 403,
  Timeout: 504,
  TransportError: 502,
  TooLarge: 502,
  NoData: 422,
  UnparseablePrice: 422,
  ResourceExhausted: 503,
  PartialResultInsufficient: 422
};

export function httpStatusFor(kind: ErrorKind): number {
  return HTTP_STATUS[kind];
}
