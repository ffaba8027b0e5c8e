/**
 * OneDrive Transfer Client
 *
 * Session management and bounded concurrent batch transfers for the
 * OneDrive (Microsoft Graph) API. One client owns one session; every public
 * operation first makes sure the session is connected and its token fresh.
 *
 * @module onedrive-transfer-client
 *
 * @example
 * ```typescript
 * import { loadSettingsFile, OneDriveClient, createConsoleLogger } from 'onedrive-transfer-client';
 *
 * const config = await loadSettingsFile('Settings.json');
 * const client = await OneDriveClient.connect(config, { logger: createConsoleLogger() });
 *
 * const { files, folders } = await client.fetchAllFiles('Test/download_test/');
 * await client.download('Test/download_test', 'download_test');
 * await client.upload(['upload_test/a.txt', 'upload_test/b.txt'], 'Test/upload_test');
 * await client.makeDir('Test/', 'move_test');
 * await client.moveAllFiles('Test/move_test', 'Test/download_test/');
 * ```
 */

// Client
export {
  OneDriveClient,
  createOneDriveClient,
  UPLOAD_ERROR_PREFIX,
  DOWNLOAD_ERROR_PREFIX,
  type OneDriveClientOptions,
  type FolderListing,
  type UploadOptions,
  type DownloadOptions,
} from "./client";

// Configuration
export {
  SettingsSchema,
  parseSettings,
  loadSettingsFile,
  isOneDriveConfig,
  DEFAULT_REFRESH_INTERVAL_SECONDS,
  DEFAULT_CONNECTION_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  type Settings,
  type OneDriveConfig,
  type RetryPolicy,
} from "./config";

// Errors
export {
  OneDriveError,
  ConfigurationError,
  AuthError,
  ConnectionError,
  RemoteOperationError,
  AggregatedError,
  NetworkError,
  errorMessage,
} from "./errors";

// Session
export { Session, type AuthHeaders, type TokenPair } from "./session/session";
export { TokenLifecycle, type TokenEndpointConfig } from "./session/token-lifecycle";
export {
  ConnectionGuard,
  defaultSleep,
  type DriveProbe,
  type Sleep,
} from "./session/connection-guard";

// Transfers
export { ErrorSink, ERROR_SEPARATOR } from "./transfer/error-sink";
export {
  BatchTransferEngine,
  type BatchEngineOptions,
  type BatchRunSummary,
  type TransferWorker,
} from "./transfer/batch-engine";
export {
  createUploadWorker,
  createDownloadWorker,
  toUploadItem,
  type UploadItem,
  type DownloadItem,
  type TransferItem,
} from "./transfer/workers";

// Remote API
export {
  DriveApi,
  DriveItemSchema,
  rootItemPath,
  trimRemotePath,
  type DriveItem,
  type DriveApiOptions,
  type ConflictBehavior,
} from "./api/drive-api";
export {
  classifyJson,
  classifyBytes,
  describeFailure,
  toRemoteOperationError,
  unwrap,
  type RemoteResult,
  type RemoteErrorInfo,
} from "./api/result";

// Transport
export {
  FetchHttpTransport,
  MockHttpTransport,
  createTransport,
  jsonResponse,
  bytesResponse,
  responseJson,
  responseText,
  type HttpTransport,
  type HttpRequest,
  type HttpResponse,
  type HttpMethod,
  type MockResponder,
} from "./transport";

// Logging
export {
  noOpLogger,
  InMemoryLogger,
  ConsoleLogger,
  createInMemoryLogger,
  createConsoleLogger,
  type Logger,
  type LogLevel,
  type LogContext,
  type LogEntry,
} from "./logging";
