import { z } from "zod";
import type { ExchangeOutcome, ResponseMeta, TransportCompletion } from "./types";
import type { ExchangeError } from "./errors";

const BatchImportResponseSchema = z.object({
  results: z.array(z.unknown()).min(1),
});

// Only the first result is consumed; later entries are not inspected.
const BatchImportResultSchema = z.object({
  registration_token: z.string(),
});

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Decode the body as UTF-8, null when absent or not valid UTF-8. */
export function decodeBody(body: Uint8Array | null): string | null {
  if (!body) return null;
  try {
    return utf8.decode(body);
  } catch {
    return null;
  }
}

function isResponseMeta(response: unknown): response is ResponseMeta {
  return (
    typeof response === "object" &&
    response !== null &&
    "statusCode" in response &&
    Number.isInteger(response.statusCode)
  );
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(error: ExchangeError): ExchangeOutcome {
  return { ok: false, error };
}

/**
 * Classify a finished batchImport request.
 *
 * Checks run in a fixed order and the first match wins:
 *   transport error → non-HTTP response → status outside 2xx →
 *   no body → body not a JSON object → wrong shape → success
 */
export function classifyCompletion(completion: TransportCompletion): ExchangeOutcome {
  if (completion.error) {
    return fail({ kind: "transportFailure", cause: completion.error });
  }

  const { response } = completion;
  if (!isResponseMeta(response)) {
    return fail({ kind: "invalidResponse" });
  }

  const text = decodeBody(completion.body);

  if (response.statusCode < 200 || response.statusCode >= 300) {
    return fail({ kind: "unexpectedStatus", status: response.statusCode, body: text });
  }

  if (!completion.body) {
    return fail({ kind: "missingBody" });
  }

  if (text === null) {
    return fail({ kind: "malformedBody", body: null });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return fail({ kind: "malformedBody", body: text });
  }
  if (!isJsonObject(json)) {
    return fail({ kind: "malformedBody", body: text });
  }

  const envelope = BatchImportResponseSchema.safeParse(json);
  if (!envelope.success) {
    return fail({ kind: "malformedBody", body: text });
  }

  const first = BatchImportResultSchema.safeParse(envelope.data.results[0]);
  if (!first.success) {
    return fail({ kind: "malformedBody", body: text });
  }

  return { ok: true, token: first.data.registration_token };
}
