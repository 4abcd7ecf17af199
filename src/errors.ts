/**
 * Error taxonomy for token exchange.
 *
 * ExchangeError values are recoverable outcomes handed to the caller.
 * PreconditionError is thrown for integration defects (missing config,
 * unserializable body) and is never folded into an outcome.
 */

export type ExchangeError =
  | { kind: "transportFailure"; cause: Error }
  | { kind: "invalidResponse" }
  | { kind: "unexpectedStatus"; status: number; body: string | null }
  | { kind: "missingBody" }
  | { kind: "malformedBody"; body: string | null };

export type ExchangeErrorKind = ExchangeError["kind"];

/** One-line diagnostic for logs and thrown errors. */
export function describeExchangeError(error: ExchangeError): string {
  switch (error.kind) {
    case "transportFailure":
      return `Transport failure: ${error.cause.message}`;
    case "invalidResponse":
      return "Response is not an HTTP response";
    case "unexpectedStatus":
      return `Unexpected status ${error.status}: ${error.body ?? "<undecodable body>"}`;
    case "missingBody":
      return "Response body missing";
    case "malformedBody":
      return `Malformed response body: ${error.body ?? "<undecodable body>"}`;
  }
}

/** Rejection value of TokenExchanger.exchangeOrThrow(). */
export class ExchangeFailedError extends Error {
  public readonly error: ExchangeError;

  constructor(error: ExchangeError) {
    super(describeExchangeError(error));
    this.name = "ExchangeFailedError";
    this.error = error;
  }
}

export type PreconditionReason = "NOT_CONFIGURED" | "SERIALIZATION_FAILED";

/**
 * Thrown before any request is sent when the integration is broken.
 * Callers should not catch this; fix the setup instead.
 */
export class PreconditionError extends Error {
  public readonly reason: PreconditionReason;

  constructor(reason: PreconditionReason, message: string) {
    super(message);
    this.name = "PreconditionError";
    this.reason = reason;
  }
}
