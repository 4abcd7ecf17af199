import type { ExchangeCallback, ExchangeConfig, ExchangeOutcome, TransportCompletion } from "./types";
import { describeExchangeError, ExchangeFailedError } from "./errors";
import { ConfigurationHolder } from "./config";
import { envMetadataProvider, resolveAppMetadata, type AppMetadataProvider } from "./metadata";
import { buildExchangeRequest } from "./request";
import { classifyCompletion } from "./classify";
import { FetchTransport, type Transport } from "./transport";
import { deliver, type ExecutionContext } from "./context";
import { logger } from "./logger";

const LOG_PREFIX = "[TokenExchanger]";

export interface TokenExchangerOptions {
  /** Fixed credentials, or a holder read at every exchange. */
  config: ExchangeConfig | ConfigurationHolder;
  transport?: Transport;
  metadata?: AppMetadataProvider;
  /** Send a diagnostic User-Agent header built from app metadata. */
  sendUserAgent?: boolean;
}

export interface ExchangeOptions {
  /** Where the callback runs. Defaults to the transport's completion tick. */
  context?: ExecutionContext;
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/**
 * Converts APNs device tokens into FCM registration tokens through the
 * Instance ID batchImport endpoint.
 *
 * Each exchange sends exactly one request and delivers exactly one
 * outcome. There is no retry; callers retry by exchanging again.
 */
export class TokenExchanger {
  private config: ExchangeConfig | ConfigurationHolder;
  private transport: Transport;
  private metadata: AppMetadataProvider;
  private sendUserAgent: boolean;

  constructor(options: TokenExchangerOptions) {
    this.config = options.config;
    this.transport = options.transport ?? new FetchTransport();
    this.metadata = options.metadata ?? envMetadataProvider();
    this.sendUserAgent = options.sendUserAgent ?? false;
  }

  /**
   * Submit `deviceToken` for conversion and return immediately.
   *
   * Throws PreconditionError synchronously, before anything is sent,
   * when credentials are missing.
   */
  exchange(deviceToken: string, callback: ExchangeCallback, options: ExchangeOptions = {}): void {
    const config = this.config instanceof ConfigurationHolder ? this.config.current() : this.config;
    const request = buildExchangeRequest(config, deviceToken, resolveAppMetadata(this.metadata), {
      userAgent: this.sendUserAgent,
    });

    let delivered = false;
    let callbackRunning = false;
    const complete = (completion: TransportCompletion): void => {
      if (delivered) {
        logger.warn(`${LOG_PREFIX} Ignoring repeated transport completion`, {
          deviceToken: deviceToken.substring(0, 8),
        });
        return;
      }
      delivered = true;

      const outcome = classifyCompletion(completion);
      if (outcome.ok) {
        logger.info(`${LOG_PREFIX} Exchanged APNs token`, {
          deviceToken: deviceToken.substring(0, 8),
        });
      } else {
        logger.warn(`${LOG_PREFIX} Token exchange failed: ${describeExchangeError(outcome.error)}`, {
          kind: outcome.error.kind,
          deviceToken: deviceToken.substring(0, 8),
        });
      }
      deliver(() => {
        callbackRunning = true;
        callback(outcome);
        callbackRunning = false;
      }, options.context);
    };

    logger.debug(`${LOG_PREFIX} Submitting batchImport`, {
      sandbox: config.environment === "development",
      deviceToken: deviceToken.substring(0, 8),
    });

    try {
      this.transport.perform(request, complete);
    } catch (e) {
      if (callbackRunning) throw e;
      if (delivered) {
        logger.error(`${LOG_PREFIX} Transport threw after completing`, e);
        return;
      }
      complete({ body: null, response: null, error: toError(e) });
    }
  }

  /**
   * Promise form of exchange(). Rejects only with PreconditionError;
   * exchange failures resolve as `{ ok: false }`.
   */
  exchangeAsync(deviceToken: string, options: ExchangeOptions = {}): Promise<ExchangeOutcome> {
    return new Promise((resolve) => this.exchange(deviceToken, resolve, options));
  }

  /** Resolve to the FCM token or reject with ExchangeFailedError. */
  async exchangeOrThrow(deviceToken: string, options: ExchangeOptions = {}): Promise<string> {
    const outcome = await this.exchangeAsync(deviceToken, options);
    if (!outcome.ok) {
      throw new ExchangeFailedError(outcome.error);
    }
    return outcome.token;
  }
}
