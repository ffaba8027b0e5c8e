/**
 * OneDrive client.
 *
 * Main entry point: owns one session and runs every public operation behind
 * the connection guard.
 *
 * @packageDocumentation
 */

import { mkdir } from "fs/promises";
import {
  type OneDriveConfig,
  isOneDriveConfig,
  parseSettings,
} from "../config";
import { RemoteOperationError } from "../errors";
import type { Logger } from "../logging";
import { noOpLogger } from "../logging";
import { createTransport, type HttpTransport } from "../transport";
import { DriveApi, trimRemotePath } from "../api/drive-api";
import { unwrap } from "../api/result";
import { Session } from "../session/session";
import { TokenLifecycle } from "../session/token-lifecycle";
import { ConnectionGuard, type Sleep } from "../session/connection-guard";
import { BatchTransferEngine, type BatchRunSummary } from "../transfer/batch-engine";
import {
  type DownloadItem,
  createDownloadWorker,
  createUploadWorker,
  toUploadItem,
} from "../transfer/workers";

export const UPLOAD_ERROR_PREFIX = "Could not upload all files: ";
export const DOWNLOAD_ERROR_PREFIX = "Could not download all files: ";

/**
 * Collaborators that can be replaced, mainly for tests.
 */
export interface OneDriveClientOptions {
  transport?: HttpTransport;
  logger?: Logger;
  /** Clock in epoch milliseconds */
  now?: () => number;
  sleep?: Sleep;
}

/**
 * Files and folders of a remote directory, by name.
 */
export interface FolderListing {
  files: Record<string, string>;
  folders: Record<string, string>;
}

export interface UploadOptions {
  /** Log one line per uploaded file (default: true) */
  log?: boolean;
}

export interface DownloadOptions {
  /** Download only the file with this name */
  specificFile?: string;
  /** Log one line per downloaded file (default: true) */
  log?: boolean;
}

/**
 * Name-to-ID map without a prototype, so remote names such as `__proto__`
 * are stored as ordinary keys.
 */
function emptyNameMap(): Record<string, string> {
  return Object.create(null);
}

export class OneDriveClient {
  readonly config: OneDriveConfig;
  private readonly session: Session;
  private readonly tokens: TokenLifecycle;
  private readonly guard: ConnectionGuard;
  private readonly api: DriveApi;
  private readonly engine: BatchTransferEngine;
  private readonly logger: Logger;

  /**
   * Validate the settings and wire the client. No request is sent.
   *
   * @param settings - Raw settings as read from a settings file, or a config built by {@link parseSettings}
   * @throws {ConfigurationError} If the settings are invalid
   */
  constructor(settings: unknown, options: OneDriveClientOptions = {}) {
    this.config = isOneDriveConfig(settings) ? settings : parseSettings(settings);
    this.logger = options.logger ?? noOpLogger;

    const transport = options.transport ?? createTransport(this.config.requestTimeoutMs);
    this.session = new Session(this.config.refreshToken);
    this.api = new DriveApi(transport, {
      baseUrl: this.config.baseUrl,
      timeout: this.config.requestTimeoutMs,
    });
    this.tokens = new TokenLifecycle(
      this.session,
      transport,
      {
        authUrl: this.config.authUrl,
        clientId: this.config.clientId,
        permissions: this.config.permissions,
        redirectUri: this.config.redirectUri,
        timeout: this.config.requestTimeoutMs,
      },
      { logger: this.logger.child({ component: "token" }), now: options.now }
    );
    this.guard = new ConnectionGuard(this.session, this.tokens, this.api, {
      logger: this.logger.child({ component: "connection" }),
      sleep: options.sleep,
    });
    this.engine = new BatchTransferEngine({
      maxConcurrency: this.config.maxConcurrency,
      logger: this.logger.child({ component: "transfer" }),
    });
  }

  /**
   * Create a client and establish the connection.
   */
  static async connect(
    settings: unknown,
    options?: OneDriveClientOptions
  ): Promise<OneDriveClient> {
    const client = new OneDriveClient(settings, options);
    await client.connect();
    return client;
  }

  /**
   * Connect if needed and refresh a stale token.
   *
   * @throws {AuthError} If the token exchange fails
   * @throws {ConnectionError} If the drive cannot be reached
   */
  async connect(): Promise<void> {
    await this.guard.ensureConnected(this.config.retryPolicy);
  }

  get isConnected(): boolean {
    return this.session.isConnected;
  }

  /**
   * List the files and folders of a remote directory.
   *
   * @param remotePath - Directory relative to the drive root, e.g. `Test/docs/`
   */
  async fetchAllFiles(remotePath: string): Promise<FolderListing> {
    await this.connect();
    const path = trimRemotePath(remotePath);
    const children = unwrap(
      await this.api.listChildren(path, this.session.authHeaders),
      `Could not fetch all files from ${path}`
    );

    const listing: FolderListing = { files: emptyNameMap(), folders: emptyNameMap() };
    for (const child of children) {
      if (child.folder) {
        listing.folders[child.name] = child.id;
      } else {
        listing.files[child.name] = child.id;
      }
    }
    return listing;
  }

  /**
   * Get the ID of a remote folder.
   */
  async fetchFolderId(remotePath: string): Promise<string> {
    await this.connect();
    const path = trimRemotePath(remotePath);
    const item = unwrap(
      await this.api.getItem(path, this.session.authHeaders),
      `Could not fetch the folder ID of ${path}`
    );
    return item.id;
  }

  /**
   * Create a folder. Fails if it already exists.
   */
  async makeDir(remotePath: string, folderName: string): Promise<void> {
    await this.connect();
    unwrap(
      await this.api.createFolder(remotePath, folderName, this.session.authHeaders),
      `Could not create the directory ${folderName}`
    );
  }

  /**
   * Move one file from a source folder to a destination folder.
   *
   * @throws {RemoteOperationError} With code `Remote.NotFound` if the source folder has no such file
   */
  async moveFile(destPath: string, srcPath: string, fileName: string): Promise<void> {
    await this.connect();
    const src = trimRemotePath(srcPath);
    const { files } = await this.fetchAllFiles(src);
    const fileId = Object.hasOwn(files, fileName) ? files[fileName] : undefined;
    if (fileId === undefined) {
      throw new RemoteOperationError(`Could not find ${fileName} in ${src}`, "NotFound");
    }
    const destId = await this.fetchFolderId(destPath);

    unwrap(
      await this.api.moveItem(fileId, destId, this.session.authHeaders),
      `Could not move file ${fileName} from ${src}`
    );
  }

  /**
   * Move a whole folder below another one: afterwards `src` lives at
   * `dest/<name of src>`.
   */
  async moveAllFiles(destPath: string, srcPath: string): Promise<void> {
    await this.connect();
    const src = trimRemotePath(srcPath);
    const srcId = await this.fetchFolderId(src);
    const destId = await this.fetchFolderId(destPath);

    unwrap(
      await this.api.moveItem(srcId, destId, this.session.authHeaders),
      `Could not move all files from ${src}`
    );
  }

  /**
   * Upload local files into one remote folder, `maxConcurrency` at a time.
   *
   * Files are taken from the end of the list. When a batch has failures the
   * call stops after that batch; files of finished batches stay uploaded.
   *
   * @throws {AggregatedError} Listing every failure of the failing batch
   */
  async upload(
    localPaths: readonly string[],
    remotePath: string,
    options: UploadOptions = {}
  ): Promise<BatchRunSummary> {
    await this.connect();
    const worker = createUploadWorker({
      api: this.api,
      headers: this.session.authHeaders,
      logger: this.logger,
      log: options.log ?? true,
      remoteFolder: trimRemotePath(remotePath),
    });
    return this.engine.runBatches(localPaths.map(toUploadItem), worker, UPLOAD_ERROR_PREFIX);
  }

  /**
   * Download every file of a remote folder, or only `specificFile`, into a
   * local directory, which is created when missing.
   *
   * @throws {AggregatedError} Listing every failure of the failing batch
   */
  async download(
    remotePath: string,
    localDir: string,
    options: DownloadOptions = {}
  ): Promise<BatchRunSummary> {
    await this.connect();
    await mkdir(localDir, { recursive: true });

    const { files } = await this.fetchAllFiles(remotePath);
    const items: DownloadItem[] = Object.entries(files)
      .filter(([name]) => !options.specificFile || name === options.specificFile)
      .map(([name, id]) => ({ remoteId: id, targetName: name }));

    const worker = createDownloadWorker({
      api: this.api,
      headers: this.session.authHeaders,
      logger: this.logger,
      log: options.log ?? true,
      localDir,
    });
    return this.engine.runBatches(items, worker, DOWNLOAD_ERROR_PREFIX);
  }
}

/**
 * Create a client and connect it.
 */
export function createOneDriveClient(
  settings: unknown,
  options?: OneDriveClientOptions
): Promise<OneDriveClient> {
  return OneDriveClient.connect(settings, options);
}
