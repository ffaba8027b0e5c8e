/**
 * Shared test fixtures.
 */

import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { Settings } from "../config";
import { MockHttpTransport, jsonResponse, type HttpRequest } from "../transport";

export const BASE_URL = "https://graph.test/v1.0/";
export const AUTH_URL = "https://login.test/common/oauth2/v2.0/token";
export const PROBE_URL = `${BASE_URL}me/drive/`;

export function testSettings(overrides: Partial<Settings> = {}): Settings {
  return {
    max_threads: 3,
    refresh_token: "test-refresh-token",
    browse_url: BASE_URL,
    auth_url: AUTH_URL,
    client_id: "test-client",
    permissions: ["Files.ReadWrite.All", "offline_access"],
    redirect_uri: "https://login.test/nativeclient",
    retry_delay_ms: 0,
    ...overrides,
  };
}

/**
 * Route the token endpoint so the n-th exchange returns `access-n` / `refresh-n`.
 */
export function routeTokenEndpoint(transport: MockHttpTransport): MockHttpTransport {
  let issued = 0;
  return transport.route("POST", AUTH_URL, () => {
    issued++;
    return jsonResponse(200, {
      token_type: "Bearer",
      access_token: `access-${issued}`,
      refresh_token: `refresh-${issued}`,
      expires_in: 3600,
    });
  });
}

/**
 * Mock transport with a working token endpoint and identity probe.
 */
export function createConnectedTransport(): MockHttpTransport {
  return routeTokenEndpoint(new MockHttpTransport()).route(
    "GET",
    PROBE_URL,
    jsonResponse(200, { id: "drive-1", driveType: "personal" })
  );
}

export function formBody(request: HttpRequest | undefined): URLSearchParams {
  return new URLSearchParams(typeof request?.body === "string" ? request.body : "");
}

export function jsonBody(request: HttpRequest | undefined): unknown {
  return typeof request?.body === "string" ? JSON.parse(request.body) : undefined;
}

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "onedrive-test-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
