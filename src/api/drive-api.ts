/**
 * Single-call requests against the OneDrive (Microsoft Graph) API.
 *
 * Each method issues one logical request and classifies the outcome into a
 * {@link RemoteResult}. Nothing here throws on a failed request; callers decide
 * whether a failure aborts the operation or is recorded for a batch.
 */

import { z } from "zod";
import type { HttpRequest, HttpResponse, HttpTransport } from "../transport";
import type { AuthHeaders } from "../session/session";
import {
  type RemoteResult,
  classifyBytes,
  classifyJson,
  transportFailure,
} from "./result";

export const DriveItemSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    folder: z.object({}).passthrough().optional(),
  })
  .passthrough();

export type DriveItem = z.infer<typeof DriveItemSchema>;

const ChildrenPageSchema = z.object({
  value: z.array(DriveItemSchema),
  "@odata.nextLink": z.string().optional(),
});

/**
 * Conflict behaviour for folder creation.
 */
export type ConflictBehavior = "fail" | "replace" | "rename";

export interface DriveApiOptions {
  /** Graph base URL ending with a slash */
  baseUrl: string;
  /** Per-request timeout in milliseconds */
  timeout?: number;
}

/**
 * Remove leading and trailing slashes from a remote path.
 */
export function trimRemotePath(path: string): string {
  return path.replace(/^\/+/, "").replace(/\/+$/, "");
}

/**
 * Address a drive item by path relative to the drive root.
 */
export function rootItemPath(remotePath: string): string {
  const trimmed = trimRemotePath(remotePath);
  if (trimmed === "") {
    return "me/drive/root";
  }
  const encoded = trimmed.split("/").map(encodeURIComponent).join("/");
  return `me/drive/root:/${encoded}:`;
}

export class DriveApi {
  private readonly baseUrl: string;
  private readonly timeout?: number;

  constructor(
    private readonly transport: HttpTransport,
    options: DriveApiOptions
  ) {
    this.baseUrl = options.baseUrl;
    this.timeout = options.timeout;
  }

  /**
   * Probe the current drive. Only HTTP 200 counts as reachable.
   */
  async probeDrive(headers: AuthHeaders): Promise<RemoteResult<void>> {
    const response = await this.send({ method: "GET", url: this.url("me/drive/"), headers });
    if ("error" in response) {
      return response;
    }
    if (response.ok.status === 200) {
      return { ok: undefined };
    }
    return {
      error: {
        kind: "status",
        status: response.ok.status,
        statusText: response.ok.statusText,
      },
    };
  }

  /**
   * List the children of a folder, following `@odata.nextLink` pages.
   */
  async listChildren(remotePath: string, headers: AuthHeaders): Promise<RemoteResult<DriveItem[]>> {
    const items: DriveItem[] = [];
    let next: string | undefined = this.url(`${rootItemPath(remotePath)}/children`);

    while (next) {
      const response = await this.send({ method: "GET", url: next, headers });
      if ("error" in response) {
        return response;
      }
      const page = classifyJson(response.ok, ChildrenPageSchema);
      if ("error" in page) {
        return page;
      }
      items.push(...page.ok.value);
      next = page.ok["@odata.nextLink"];
    }

    return { ok: items };
  }

  /**
   * Get the metadata of the item at a path.
   */
  async getItem(remotePath: string, headers: AuthHeaders): Promise<RemoteResult<DriveItem>> {
    const response = await this.send({
      method: "GET",
      url: this.url(rootItemPath(remotePath)),
      headers,
    });
    if ("error" in response) {
      return response;
    }
    return classifyJson(response.ok, DriveItemSchema);
  }

  /**
   * Create a folder below a parent folder.
   */
  async createFolder(
    parentPath: string,
    name: string,
    headers: AuthHeaders,
    conflictBehavior: ConflictBehavior = "fail"
  ): Promise<RemoteResult<DriveItem>> {
    const response = await this.send({
      method: "POST",
      url: this.url(`${rootItemPath(parentPath)}/children`),
      headers: { ...headers, "content-type": "application/json" },
      body: JSON.stringify({
        name,
        folder: {},
        "@microsoft.graph.conflictBehavior": conflictBehavior,
      }),
    });
    if ("error" in response) {
      return response;
    }
    return classifyJson(response.ok, DriveItemSchema);
  }

  /**
   * Move an item under another folder.
   */
  async moveItem(
    itemId: string,
    destinationFolderId: string,
    headers: AuthHeaders
  ): Promise<RemoteResult<DriveItem>> {
    const response = await this.send({
      method: "PATCH",
      url: this.url(`me/drive/items/${encodeURIComponent(itemId)}`),
      headers: { ...headers, "content-type": "application/json" },
      body: JSON.stringify({ parentReference: { id: destinationFolderId } }),
    });
    if ("error" in response) {
      return response;
    }
    return classifyJson(response.ok, DriveItemSchema);
  }

  /**
   * Write the whole content of a file in one request.
   */
  async uploadContent(
    remoteFolder: string,
    fileName: string,
    content: Uint8Array,
    headers: AuthHeaders
  ): Promise<RemoteResult<DriveItem>> {
    const target = `${trimRemotePath(remoteFolder)}/${fileName}`;
    const response = await this.send({
      method: "PUT",
      url: this.url(`${rootItemPath(target)}/content`),
      headers: { ...headers, "content-type": "application/octet-stream" },
      body: content,
    });
    if ("error" in response) {
      return response;
    }
    return classifyJson(response.ok, DriveItemSchema);
  }

  /**
   * Read the whole content of a file in one request.
   */
  async downloadContent(itemId: string, headers: AuthHeaders): Promise<RemoteResult<Uint8Array>> {
    const response = await this.send({
      method: "GET",
      url: this.url(`me/drive/items/${encodeURIComponent(itemId)}/content`),
      headers,
    });
    if ("error" in response) {
      return response;
    }
    return classifyBytes(response.ok);
  }

  private url(path: string): string {
    return `${this.baseUrl}${path}`;
  }

  private async send(request: HttpRequest): Promise<RemoteResult<HttpResponse>> {
    try {
      const response = await this.transport.send({ timeout: this.timeout, ...request });
      return { ok: response };
    } catch (error) {
      return transportFailure(error);
    }
  }
}
