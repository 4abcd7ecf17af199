import { z } from "zod";
import type { Environment, ExchangeConfig } from "./types";
import { PreconditionError } from "./errors";

/**
 * Build an immutable config value. The key is stored as given;
 * Google rejects a bad key with a non-2xx status.
 */
export function createConfig(apiKey: string, environment: Environment): ExchangeConfig {
  return Object.freeze({ apiKey, environment });
}

/**
 * Mutable holder for hosts that configure once at startup and hand the
 * holder around before credentials are known. Last configure() wins.
 */
export class ConfigurationHolder {
  private config: ExchangeConfig | null = null;

  configure(apiKey: string, environment: Environment): void {
    this.config = createConfig(apiKey, environment);
  }

  get isConfigured(): boolean {
    return this.config !== null;
  }

  /** Current config. Throws PreconditionError if configure() was never called. */
  current(): ExchangeConfig {
    if (!this.config) {
      throw new PreconditionError(
        "NOT_CONFIGURED",
        "FCM server key and/or APNs environment not set, call configure() first",
      );
    }
    return this.config;
  }
}

const EnvSchema = z.object({
  FCM_SERVER_KEY: z.string().min(1, "FCM_SERVER_KEY must not be empty"),
  APNS_ENVIRONMENT: z.enum(["development", "production"]),
});

/**
 * Read credentials from environment variables:
 *   FCM_SERVER_KEY    (required)
 *   APNS_ENVIRONMENT  "development" | "production" (required)
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ExchangeConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join(".") ?? "environment";
    throw new PreconditionError(
      "NOT_CONFIGURED",
      `Invalid ${variable}: ${issue?.message ?? "invalid value"}`,
    );
  }
  return createConfig(parsed.data.FCM_SERVER_KEY, parsed.data.APNS_ENVIRONMENT);
}
