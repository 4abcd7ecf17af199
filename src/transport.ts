import type { ExchangeRequest, TransportCompletion } from "./types";
import { rethrowAsync } from "./context";

/**
 * Performs one HTTP request and reports (body, response, error) once
 * it finishes. Completion may run on any tick.
 */
export interface Transport {
  perform(request: ExchangeRequest, completion: (result: TransportCompletion) => void): void;
}

export interface FetchTransportOptions {
  fetchFn?: typeof fetch;
  /** Abort after this many ms; surfaces as a transport failure. */
  timeoutMs?: number;
  /** Receives exceptions thrown by the completion handler. Rethrows them uncaught by default. */
  onError?: (error: unknown) => void;
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/** Transport over fetch (global by default, injectable for tests). */
export class FetchTransport implements Transport {
  private fetchFn: typeof fetch;
  private timeoutMs: number | undefined;
  private onError: (error: unknown) => void;

  constructor(options: FetchTransportOptions = {}) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.timeoutMs = options.timeoutMs;
    this.onError = options.onError ?? rethrowAsync;
  }

  perform(request: ExchangeRequest, completion: (result: TransportCompletion) => void): void {
    this.send(request)
      .then(completion, (e: unknown) =>
        completion({ body: null, response: null, error: toError(e) }),
      )
      .catch(this.onError);
  }

  private async send(request: ExchangeRequest): Promise<TransportCompletion> {
    const res = await this.fetchFn(request.url, {
      method: request.method,
      headers: { ...request.headers },
      body: request.body,
      signal: this.timeoutMs === undefined ? undefined : AbortSignal.timeout(this.timeoutMs),
    });

    // No body stream (e.g. 204) is reported as a missing body
    const body = res.body === null ? null : new Uint8Array(await res.arrayBuffer());
    return { body, response: { statusCode: res.status }, error: null };
  }
}
