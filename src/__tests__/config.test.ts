/**
 * Tests for settings validation.
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { writeFile } from "fs/promises";
import { join } from "path";
import {
  ConfigurationError,
  DEFAULT_CONNECTION_ATTEMPTS,
  DEFAULT_REFRESH_INTERVAL_SECONDS,
  DEFAULT_RETRY_DELAY_MS,
  MockHttpTransport,
  OneDriveClient,
  loadSettingsFile,
  parseSettings,
} from "../index";
import { BASE_URL, createTempDir, removeTempDir, testSettings } from "./fixtures";

const REQUIRED_KEYS = [
  "max_threads",
  "refresh_token",
  "browse_url",
  "auth_url",
  "client_id",
  "permissions",
  "redirect_uri",
] as const;

function withoutKey(key: string): Record<string, unknown> {
  const raw: Record<string, unknown> = { ...testSettings() };
  delete raw[key];
  return raw;
}

describe("parseSettings", () => {
  it("should map settings to the client configuration", () => {
    const config = parseSettings(testSettings({ retry_delay_ms: 250, refresh_interval: 120 }));

    expect(config.maxConcurrency).toBe(3);
    expect(config.refreshToken).toBe("test-refresh-token");
    expect(config.baseUrl).toBe(BASE_URL);
    expect(config.clientId).toBe("test-client");
    expect(config.permissions).toEqual(["Files.ReadWrite.All", "offline_access"]);
    expect(config.retryPolicy).toEqual({
      maxAttempts: DEFAULT_CONNECTION_ATTEMPTS,
      perAttemptDelayMs: 250,
      refreshIntervalMs: 120000,
    });
  });

  it("should apply defaults for optional settings", () => {
    const raw = withoutKey("retry_delay_ms");
    const config = parseSettings(raw);

    expect(config.retryPolicy.maxAttempts).toBe(50);
    expect(config.retryPolicy.perAttemptDelayMs).toBe(DEFAULT_RETRY_DELAY_MS);
    expect(config.retryPolicy.refreshIntervalMs).toBe(DEFAULT_REFRESH_INTERVAL_SECONDS * 1000);
    expect(config.requestTimeoutMs).toBe(300000);
  });

  it("should add a trailing slash to the browse URL", () => {
    const config = parseSettings(testSettings({ browse_url: "https://graph.test/v1.0" }));
    expect(config.baseUrl).toBe("https://graph.test/v1.0/");
  });

  it.each(REQUIRED_KEYS)("should reject settings without %s", (key) => {
    expect(() => parseSettings(withoutKey(key))).toThrow(ConfigurationError);

    try {
      parseSettings(withoutKey(key));
    } catch (error) {
      expect(error).toMatchObject({ code: "Configuration.MissingRequired" });
      expect(error).toHaveProperty("message", expect.stringContaining(key));
    }
  });

  it.each([
    ["max_threads", "4"],
    ["max_threads", 0],
    ["max_threads", 2.5],
    ["permissions", "Files.Read"],
    ["refresh_interval", "3600"],
    ["number_retry_connection", 0],
    ["browse_url", "not a url"],
  ])("should reject %s = %j", (key, value) => {
    const raw: Record<string, unknown> = { ...testSettings(), [key]: value };

    expect(() => parseSettings(raw)).toThrow(ConfigurationError);
    try {
      parseSettings(raw);
    } catch (error) {
      expect(error).toMatchObject({ code: "Configuration.InvalidValue" });
    }
  });

  it("should reject a value that is not an object", () => {
    expect(() => parseSettings(null)).toThrow(ConfigurationError);
  });
});

describe("OneDriveClient construction", () => {
  it.each(REQUIRED_KEYS)("should fail without %s and send no request", (key) => {
    const transport = new MockHttpTransport();

    expect(() => new OneDriveClient(withoutKey(key), { transport })).toThrow(ConfigurationError);
    expect(transport.getRequests()).toHaveLength(0);
  });

  it("should not send any request while constructing", () => {
    const transport = new MockHttpTransport();
    const client = new OneDriveClient(testSettings(), { transport });

    expect(client.isConnected).toBe(false);
    expect(transport.getRequests()).toHaveLength(0);
  });

  it("should reject max_threads of zero", () => {
    expect(() => new OneDriveClient(testSettings({ max_threads: 0 }))).toThrow(ConfigurationError);
  });
});

describe("loadSettingsFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("should load and validate a settings file", async () => {
    const path = join(dir, "Settings.json");
    await writeFile(path, JSON.stringify(testSettings({ max_threads: 8 })));

    const config = await loadSettingsFile(path);
    expect(config.maxConcurrency).toBe(8);
  });

  it("should reject a file that is not JSON", async () => {
    const path = join(dir, "Settings.json");
    await writeFile(path, "{ max_threads: 8");

    await expect(loadSettingsFile(path)).rejects.toMatchObject({
      name: "ConfigurationError",
      code: "Configuration.InvalidFile",
    });
  });

  it("should reject a missing file", async () => {
    await expect(loadSettingsFile(join(dir, "missing.json"))).rejects.toMatchObject({
      code: "Configuration.InvalidFile",
    });
  });

  it("should reject a file with invalid settings", async () => {
    const path = join(dir, "Settings.json");
    await writeFile(path, JSON.stringify(withoutKey("client_id")));

    await expect(loadSettingsFile(path)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
