/**
 * Tests for token refresh and the heartbeat.
 */

import { beforeEach, describe, expect, it } from "vitest";
import {
  AuthError,
  MockHttpTransport,
  NetworkError,
  Session,
  TokenLifecycle,
  createInMemoryLogger,
  jsonResponse,
  type RetryPolicy,
} from "../index";
import { AUTH_URL, formBody, routeTokenEndpoint } from "./fixtures";

const POLICY: RetryPolicy = {
  maxAttempts: 3,
  perAttemptDelayMs: 0,
  refreshIntervalMs: 1000,
};

const ENDPOINT = {
  authUrl: AUTH_URL,
  clientId: "test-client",
  permissions: ["Files.ReadWrite.All", "offline_access"],
  redirectUri: "https://login.test/nativeclient",
};

describe("TokenLifecycle", () => {
  let transport: MockHttpTransport;
  let session: Session;
  let now: number;

  function createLifecycle(): TokenLifecycle {
    return new TokenLifecycle(session, transport, ENDPOINT, { now: () => now });
  }

  beforeEach(() => {
    transport = new MockHttpTransport();
    session = new Session("test-refresh-token");
    now = 10_000;
  });

  describe("refresh", () => {
    it("should post the refresh-token grant", async () => {
      routeTokenEndpoint(transport);

      await createLifecycle().refresh();

      const request = transport.getLastRequest();
      expect(request?.method).toBe("POST");
      expect(request?.url).toBe(AUTH_URL);
      expect(request?.headers?.["content-type"]).toBe("application/x-www-form-urlencoded");

      const form = formBody(request);
      expect(form.get("client_id")).toBe("test-client");
      expect(form.get("scope")).toBe("Files.ReadWrite.All offline_access");
      expect(form.get("refresh_token")).toBe("test-refresh-token");
      expect(form.get("redirect_uri")).toBe("https://login.test/nativeclient");
      expect(form.get("grant_type")).toBe("refresh_token");
    });

    it("should store both tokens and rebuild the headers", async () => {
      routeTokenEndpoint(transport);

      await createLifecycle().refresh();

      expect(session.accessToken).toBe("access-1");
      expect(session.refreshToken).toBe("refresh-1");
      expect(session.lastRefreshedAt).toBe(10_000);
      expect(session.authHeaders).toEqual({ Authorization: "Bearer access-1" });
      expect(Object.isFrozen(session.authHeaders)).toBe(true);
    });

    it("should send the rotated refresh token on the next exchange", async () => {
      routeTokenEndpoint(transport);
      const tokens = createLifecycle();

      await tokens.refresh();
      await tokens.refresh();

      const requests = transport.getRequests();
      expect(formBody(requests[1]).get("refresh_token")).toBe("refresh-1");
      expect(session.authHeaders).toEqual({ Authorization: "Bearer access-2" });
    });

    it("should keep the session when the access token is missing", async () => {
      routeTokenEndpoint(transport);
      const tokens = createLifecycle();
      await tokens.refresh();

      transport = new MockHttpTransport().route(
        "POST",
        AUTH_URL,
        jsonResponse(200, { token_type: "Bearer", refresh_token: "refresh-x" })
      );
      now = 20_000;
      const failing = createLifecycle();

      await expect(failing.refresh()).rejects.toMatchObject({
        name: "AuthError",
        code: "Auth.InvalidResponse",
        message: "Token response is missing access_token",
      });
      expect(session.accessToken).toBe("access-1");
      expect(session.refreshToken).toBe("refresh-1");
      expect(session.lastRefreshedAt).toBe(10_000);
      expect(session.authHeaders).toEqual({ Authorization: "Bearer access-1" });
    });

    it("should reject a response without any token", async () => {
      transport.route("POST", AUTH_URL, jsonResponse(200, {}));

      await expect(createLifecycle().refresh()).rejects.toMatchObject({
        message: "Token response is missing access_token, refresh_token",
      });
      expect(session.accessToken).toBe("");
      expect(session.authHeaders).toEqual({});
    });

    it("should report the endpoint's error description", async () => {
      transport.route(
        "POST",
        AUTH_URL,
        jsonResponse(400, { error: "invalid_grant", error_description: "Token expired" })
      );

      const refresh = createLifecycle().refresh();

      await expect(refresh).rejects.toBeInstanceOf(AuthError);
      await expect(refresh).rejects.toMatchObject({
        code: "Auth.RefreshFailed",
        status: 400,
        message: "Token refresh failed with status 400: Token expired",
      });
    });

    it("should fall back to the status text without an error body", async () => {
      transport.route("POST", AUTH_URL, jsonResponse(502, "bad gateway"));

      await expect(createLifecycle().refresh()).rejects.toMatchObject({
        message: "Token refresh failed with status 502: Error",
      });
    });

    it("should wrap transport failures", async () => {
      transport.route("POST", AUTH_URL, () => {
        throw new NetworkError("Connection failed: refused", "ConnectionFailed");
      });
      const logger = createInMemoryLogger();
      const tokens = new TokenLifecycle(session, transport, ENDPOINT, { logger, now: () => now });

      await expect(tokens.refresh()).rejects.toMatchObject({
        code: "Auth.NetworkFailure",
        message: "Token refresh failed: Connection failed: refused",
      });
      expect(logger.getLogsByLevel("error")[0]?.context.errorCode).toBe(
        "Network.ConnectionFailed"
      );
    });

    it("should share one exchange between concurrent callers", async () => {
      routeTokenEndpoint(transport);
      const tokens = createLifecycle();

      await Promise.all([tokens.refresh(), tokens.refresh(), tokens.refresh()]);

      expect(transport.getRequests()).toHaveLength(1);
      expect(session.accessToken).toBe("access-1");
    });
  });

  describe("ensureFresh", () => {
    it("should refresh a token that was never issued", async () => {
      routeTokenEndpoint(transport);

      await createLifecycle().ensureFresh(POLICY);

      expect(transport.getRequests()).toHaveLength(1);
    });

    it("should refresh only once the interval has been exceeded", async () => {
      routeTokenEndpoint(transport);
      const tokens = createLifecycle();
      await tokens.refresh();

      now = 11_000;
      await tokens.ensureFresh(POLICY);
      expect(transport.getRequests()).toHaveLength(1);

      now = 11_001;
      await tokens.ensureFresh(POLICY);
      expect(transport.getRequests()).toHaveLength(2);
      expect(session.lastRefreshedAt).toBe(11_001);
    });

    it("should refresh once for back-to-back calls", async () => {
      routeTokenEndpoint(transport);
      const tokens = createLifecycle();

      await tokens.ensureFresh(POLICY);
      await tokens.ensureFresh(POLICY);

      expect(transport.getRequests()).toHaveLength(1);
    });

    it("should refresh once for concurrent stale callers", async () => {
      routeTokenEndpoint(transport);
      const tokens = createLifecycle();

      await Promise.all([
        tokens.ensureFresh(POLICY),
        tokens.ensureFresh(POLICY),
        tokens.ensureFresh(POLICY),
      ]);

      expect(transport.getRequests()).toHaveLength(1);
    });
  });
});
