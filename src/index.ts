// Programmatic API: settings, collection core, exporter and the HTTP control surface
export { logger } from "./logger.js";
export type { Logger } from "./logger.js";
export {
  loadSettings,
  loadServerSettings,
  loadConfigFromPath,
  getConfigPath,
  loadDotEnv,
  SETTINGS_ENV,
  DEFAULT_API_BASE_URL,
} from "./config/index.js";
export type {
  CollectorSettings,
  CollectorServerSettings,
  CollectorConfigFile,
} from "./config/index.js";
export {
  CollectorError,
  ConfigMissingError,
  ConfigInvalidError,
  RateLimitedError,
  TransportFailureError,
  ExhaustedRetriesError,
  CorruptLogError,
  InvalidDateError,
  isCollectorError,
} from "./errors.js";
export type { CollectorErrorCode } from "./errors.js";
export {
  HttpRetryClient,
  MAX_DELAY_MS,
  backoffSeconds,
  delayMs,
  parseRetryAfter,
} from "./core/RetryClient.js";
export type {
  FetchFn,
  FetchResult,
  PageFetcher,
  RetryState,
  SleepFn,
} from "./core/RetryClient.js";
export {
  decodePage,
  resolveNext,
  nextPageRequest,
  initialPageRequest,
  pageRequestUrl,
  eventsStreamUrl,
} from "./core/cursor.js";
export { normalizeEvent } from "./core/normalize.js";
export { appendRecord, ensureLog, serializeRecord, sessionLogPath } from "./core/LogWriter.js";
export { Collector, fileRecordSink } from "./core/Collector.js";
export type { RecordSink, CollectorOptions } from "./core/Collector.js";
export { exportLogToCsv, decodeRecordLine, defaultCsvPath } from "./core/exporter.js";
export {
  ProgressChannel,
  describeProgress,
  formatProgressLine,
  isTerminalProgress,
} from "./core/ProgressChannel.js";
export type { ProgressEvent, ProgressPayload, ProgressType } from "./core/ProgressChannel.js";
export { SessionManager } from "./core/SessionManager.js";
export { runInForeground } from "./core/foreground.js";
export type { ForegroundOptions } from "./core/foreground.js";
export type {
  CollectionSession,
  SessionSummary,
  SessionStatus,
  StartResult,
  ExportResult,
} from "./core/SessionManager.js";
export { collectionWindow, sessionNameFrom, WINDOW_OFFSET_MINUTES } from "./core/window.js";
export type { CollectionWindow } from "./core/window.js";
export { CollectorHttpServer, buildApp } from "./server/index.js";
export type { CollectorHttpServerConfig } from "./server/index.js";
export { AUDIT_RECORD_FIELDS } from "./core/types.js";
export type {
  AuditRecord,
  CollectionOutcome,
  CollectionRequest,
  CollectorState,
  NextPage,
  PageRequest,
  PageResponse,
  RawEvent,
} from "./core/types.js";
