/**
 * APNs → FCM Token Bridge – shared types
 *
 * Wire format (Instance ID batchImport):
 *   POST https://iid.googleapis.com/iid/v1:batchImport
 *   Authorization: key=<server key>
 *   { "application": "<bundle id>", "sandbox": <bool>, "apns_tokens": ["<token>"] }
 *
 * Success response:
 *   { "results": [{ "apns_token": "...", "status": "OK", "registration_token": "..." }] }
 */

import type { ExchangeError } from "./errors";

/** APNs environment the device token was issued for. */
export type Environment = "development" | "production";

/** Credentials for the batchImport endpoint. Build with createConfig(). */
export interface ExchangeConfig {
  readonly apiKey: string; // FCM server key (secret)
  readonly environment: Environment;
}

/** Host application metadata, "(not set)" when unknown. */
export interface AppMetadata {
  bundleId: string;
  name: string;
  version: string;
  build: string;
}

/** One outbound request, built fresh per exchange. */
export interface ExchangeRequest {
  readonly method: "POST";
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
}

/** JSON body sent to batchImport. Always a single token. */
export interface BatchImportBody {
  application: string;
  sandbox: boolean;
  apns_tokens: [string];
}

/** Per-token entry in the batchImport response. */
export interface BatchImportResult {
  registration_token: string;
  apns_token?: string;
  status?: string;
}

/** HTTP-style response metadata handed back by a transport. */
export interface ResponseMeta {
  statusCode: number;
}

/**
 * What a transport reports when a request finishes.
 * `response` is left untyped: only an object with an integer
 * statusCode counts as an HTTP response.
 */
export interface TransportCompletion {
  body: Uint8Array | null;
  response: unknown;
  error: Error | null;
}

/** Result of one exchange, delivered exactly once. */
export type ExchangeOutcome =
  | { ok: true; token: string }
  | { ok: false; error: ExchangeError };

export type ExchangeCallback = (outcome: ExchangeOutcome) => void;
