import type { AppMetadata, BatchImportBody, ExchangeConfig, ExchangeRequest } from "./types";
import { PreconditionError } from "./errors";
import { buildUserAgent } from "./metadata";

export const BATCH_IMPORT_URL = "https://iid.googleapis.com/iid/v1:batchImport";

export interface BuildRequestOptions {
  /** Adds a diagnostic User-Agent header. Off by default. */
  userAgent?: boolean;
}

function assertConfigured(config: Partial<ExchangeConfig> | null | undefined): asserts config is ExchangeConfig {
  if (
    !config ||
    typeof config.apiKey !== "string" ||
    (config.environment !== "development" && config.environment !== "production")
  ) {
    throw new PreconditionError(
      "NOT_CONFIGURED",
      "FCM server key and/or APNs environment not set, call configure() first",
    );
  }
}

/**
 * Build the batchImport request for a single APNs device token.
 *
 * The token is passed through verbatim; Google validates it.
 * Missing credentials or an unserializable body throw PreconditionError
 * since sending would produce an unauthenticated or malformed request.
 */
export function buildExchangeRequest(
  config: Partial<ExchangeConfig> | null | undefined,
  deviceToken: string,
  metadata: AppMetadata,
  options: BuildRequestOptions = {},
): ExchangeRequest {
  assertConfigured(config);

  const payload: BatchImportBody = {
    application: metadata.bundleId,
    sandbox: config.environment === "development",
    apns_tokens: [deviceToken],
  };

  let body: string;
  try {
    body = JSON.stringify(payload);
  } catch (e) {
    throw new PreconditionError(
      "SERIALIZATION_FAILED",
      e instanceof Error ? e.message : "request body could not be serialized",
    );
  }

  const headers: Record<string, string> = {
    authorization: `key=${config.apiKey}`,
    "content-type": "application/json",
  };
  if (options.userAgent) {
    headers["user-agent"] = buildUserAgent(metadata);
  }

  const request: ExchangeRequest = {
    method: "POST",
    url: BATCH_IMPORT_URL,
    headers: Object.freeze(headers),
    body,
  };
  return Object.freeze(request);
}
