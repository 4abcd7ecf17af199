/**
 * APNs → FCM Token Bridge
 *
 * Turns an APNs device token into an FCM registration token without the
 * Firebase SDK, through Google's Instance ID server API:
 *   POST https://iid.googleapis.com/iid/v1:batchImport
 *
 * Flow:
 *   createConfig() / ConfigurationHolder.configure()  → credentials, once
 *   new TokenExchanger({ config })                    → per process
 *   exchanger.exchange(token, callback, { context })  → one request, one outcome
 *
 * The FCM project must already have an APNs auth key uploaded in the
 * Firebase console, and the application id must match the iOS bundle id.
 */

export type {
  AppMetadata,
  BatchImportBody,
  BatchImportResult,
  Environment,
  ExchangeCallback,
  ExchangeConfig,
  ExchangeOutcome,
  ExchangeRequest,
  ResponseMeta,
  TransportCompletion,
} from "./types";
export type { ExchangeError, ExchangeErrorKind, PreconditionReason } from "./errors";
export { describeExchangeError, ExchangeFailedError, PreconditionError } from "./errors";
export { ConfigurationHolder, createConfig, loadConfigFromEnv } from "./config";
export type { AppMetadataProvider } from "./metadata";
export {
  buildUserAgent,
  envMetadataProvider,
  NOT_SET,
  resolveAppMetadata,
  staticMetadataProvider,
} from "./metadata";
export type { BuildRequestOptions } from "./request";
export { BATCH_IMPORT_URL, buildExchangeRequest } from "./request";
export { classifyCompletion, decodeBody } from "./classify";
export type { FetchTransportOptions, Transport } from "./transport";
export { FetchTransport } from "./transport";
export type { ExecutionContext } from "./context";
export { deliver, microtaskContext, rethrowAsync, SerialQueue } from "./context";
export type { ExchangeOptions, TokenExchangerOptions } from "./exchange";
export { TokenExchanger } from "./exchange";
export type { Logger } from "./logger";
export { logger } from "./logger";
