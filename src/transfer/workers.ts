/**
 * Per-item upload and download workers run by the batch engine.
 */

import { readFile, stat, writeFile } from "fs/promises";
import { join } from "path";
import { errorMessage } from "../errors";
import type { Logger } from "../logging";
import type { DriveApi } from "../api/drive-api";
import { describeFailure } from "../api/result";
import type { AuthHeaders } from "../session/session";
import type { TransferWorker } from "./batch-engine";

/**
 * A local file to upload.
 */
export interface UploadItem {
  readonly localPath: string;
  /** Name of the remote file: the base name of `localPath` */
  readonly targetName: string;
}

/**
 * A remote file to download.
 */
export interface DownloadItem {
  readonly remoteId: string;
  /** Name of the local file written below the target directory */
  readonly targetName: string;
}

export type TransferItem = UploadItem | DownloadItem;

/**
 * Build an upload item. Backslashes count as path separators, so Windows
 * style paths keep their base name.
 */
export function toUploadItem(localPath: string): UploadItem {
  const normalized = localPath.replace(/\\/g, "/");
  const segments = normalized.split("/");
  return {
    localPath: normalized,
    targetName: segments[segments.length - 1] ?? normalized,
  };
}

interface WorkerContext {
  api: DriveApi;
  /** Header snapshot taken before the batch starts */
  headers: AuthHeaders;
  logger: Logger;
  /** Log one line per transferred file */
  log: boolean;
}

export function createUploadWorker(
  context: WorkerContext & { remoteFolder: string }
): TransferWorker<UploadItem> {
  const { api, headers, logger, log, remoteFolder } = context;

  return async (item, sink) => {
    const description = `Could not upload ${item.localPath}`;

    let isFile = false;
    try {
      isFile = (await stat(item.localPath)).isFile();
    } catch (error) {
      logger.debug("Upload source not found", { item: item.localPath, error: errorMessage(error) });
    }
    if (!isFile) {
      sink.record(`${description}: File does not exist`);
      return;
    }

    let content: Uint8Array;
    try {
      content = await readFile(item.localPath);
    } catch (error) {
      sink.record(`${description}: ${errorMessage(error)}`);
      return;
    }

    const result = await api.uploadContent(remoteFolder, item.targetName, content, headers);
    if ("error" in result) {
      sink.record(describeFailure(description, result.error));
      return;
    }

    if (log) {
      logger.info(`File ${item.localPath} has been uploaded`, { item: item.localPath });
    }
  };
}

export function createDownloadWorker(
  context: WorkerContext & { localDir: string }
): TransferWorker<DownloadItem> {
  const { api, headers, logger, log, localDir } = context;

  return async (item, sink) => {
    const result = await api.downloadContent(item.remoteId, headers);
    if ("error" in result) {
      sink.record(describeFailure(`Could not download ${item.targetName}`, result.error));
      return;
    }

    const target = join(localDir, item.targetName);
    try {
      await writeFile(target, result.ok);
    } catch (error) {
      sink.record(`Could not write ${target} to disk: ${errorMessage(error)}`);
      return;
    }

    if (log) {
      logger.info(`File ${item.targetName} has been downloaded`, { item: item.targetName });
    }
  };
}
