import { afterEach, describe, expect, it } from "vitest";

import { createApp } from "../../src/app.js";
import { parseEnv } from "../../src/config/env.js";
import { closeAppContext, createAppContext } from "../../src/context.js";
import type { AppContext, AppContextOverrides } from "../../src/context.js";
import { TokenCodec } from "../../src/modules/auth/token-codec.js";
import { TEST_SECRET, UnavailableSessionStore } from "../helpers/fixtures.js";
import { startTestServer } from "../helpers/test-server.js";
import type { TestServer } from "../helpers/test-server.js";

const HEADER = "AccessToken";
const CREATED_AT = "2026-01-01T00:00:00.000Z";

interface LoginBody {
  code: number;
  msg: string;
  data: { jti: string; header: string; token: string };
}

const testEnv = parseEnv({
  NODE_ENV: "test",
  DATABASE_PATH: ":memory:",
  SESSION_STORE_DRIVER: "memory",
  JWT_SECRET_KEY: TEST_SECRET,
  RATE_LIMIT_MAX_LOGIN: "100"
});

describe("account routes", () => {
  let context: AppContext;
  let server: TestServer | null = null;
  let contextToClose: AppContext | null = null;

  const start = async (overrides: AppContextOverrides = {}): Promise<string> => {
    context = createAppContext(testEnv, overrides);
    contextToClose = context;

    context.samplesRepository.create({
      id: "sample-1",
      platformProductId: "product-1",
      platformCampaignId: "campaign-1",
      platformCreatorUsername: "u1",
      platformCreatorDisplayName: "User One",
      status: "1",
      creationTime: CREATED_AT,
      lastModificationTime: CREATED_AT
    });
    context.samplesRepository.create({
      id: "sample-2",
      platformProductId: "product-2",
      platformCampaignId: null,
      platformCreatorUsername: "ghost",
      platformCreatorDisplayName: null,
      status: null,
      creationTime: CREATED_AT,
      lastModificationTime: CREATED_AT
    });
    context.creatorsRepository.create({
      id: "creator-1",
      platform: "tiktok",
      platformCreatorId: "7001",
      platformCreatorUsername: "u1",
      platformCreatorDisplayName: "User One",
      email: "u1@example.com",
      whatsapp: null,
      creationTime: CREATED_AT,
      lastModificationTime: CREATED_AT
    });

    server = await startTestServer(createApp(context));
    return server.baseUrl;
  };

  const login = async (baseUrl: string, body: Record<string, string>): Promise<Response> => {
    return fetch(`${baseUrl}/account/login`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body)
    });
  };

  const loginToken = async (baseUrl: string): Promise<string> => {
    const response = await login(baseUrl, { sampleId: "sample-1", userName: "u1" });
    const body = (await response.json()) as LoginBody;
    return body.data.token;
  };

  afterEach(async () => {
    await server?.close();
    server = null;

    if (contextToClose) {
      await closeAppContext(contextToClose);
      contextToClose = null;
    }
  });

  describe("POST /account/login", () => {
    it("issues a token and names the header it must be sent in", async () => {
      const baseUrl = await start();

      const response = await login(baseUrl, { sampleId: "sample-1", userName: "u1" });
      const body = (await response.json()) as LoginBody;

      expect(response.status).toBe(200);
      expect(body.code).toBe(200);
      expect(body.msg).toBe("success");
      expect(body.data.header).toBe(HEADER);
      expect(body.data.jti).toMatch(/^\d+$/);
      expect(await context.sessionStore.list("u1")).toEqual([body.data.jti]);

      const claims = await context.tokenCodec.verify(body.data.token);
      expect(claims.ok && claims.value).toMatchObject({
        subject: "u1",
        sessionId: body.data.jti,
        extra: { creator_id: "sample-1" }
      });
    });

    it("accepts the alternate field spellings", async () => {
      const baseUrl = await start();

      const response = await login(baseUrl, { sampleID: "sample-1", username: "u1" });

      expect(response.status).toBe(200);
    });

    it("rejects a sample that does not belong to the user", async () => {
      const baseUrl = await start();

      const response = await login(baseUrl, { sampleId: "sample-2", userName: "u1" });

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({
        error: { code: "INVALID_CREDENTIALS", message: "Invalid username or password" }
      });
    });

    it("rejects a payload without a username", async () => {
      const baseUrl = await start();

      const response = await login(baseUrl, { sampleId: "sample-1" });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: { code: "VALIDATION_ERROR", message: "Invalid login payload" }
      });
    });

    it("rejects a body that is not valid JSON", async () => {
      const baseUrl = await start();

      const response = await fetch(`${baseUrl}/account/login`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{bad"
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: { code: "VALIDATION_ERROR", message: "Invalid request payload" }
      });
    });

    it("answers 503 when the session cannot be stored", async () => {
      const baseUrl = await start({ sessionStore: new UnavailableSessionStore() });

      const response = await login(baseUrl, { sampleId: "sample-1", userName: "u1" });

      expect(response.status).toBe(503);
      expect(await response.json()).toEqual({
        error: { code: "SESSION_STORE_UNAVAILABLE", message: "Session store unavailable" }
      });
    });
  });

  describe("GET /account/me", () => {
    it("returns the principal captured at login", async () => {
      const baseUrl = await start();
      const loginResponse = await login(baseUrl, { sampleId: "sample-1", userName: "u1" });
      const { data } = (await loginResponse.json()) as LoginBody;

      const response = await fetch(`${baseUrl}/account/me`, { headers: { [HEADER]: data.token } });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        code: 200,
        msg: "success",
        data: {
          jti: data.jti,
          ifId: "creator-1",
          platformCreatorId: "7001",
          platformCreatorUsername: "u1",
          platformCreatorDisplayName: "User One",
          email: "u1@example.com",
          whatsapp: ""
        }
      });
    });

    it("falls back to a placeholder principal when the creator row is missing", async () => {
      const baseUrl = await start();
      const loginResponse = await login(baseUrl, { sampleId: "sample-2", userName: "ghost" });
      const { data } = (await loginResponse.json()) as LoginBody;

      const response = await fetch(`${baseUrl}/account/me`, { headers: { [HEADER]: data.token } });
      const body = (await response.json()) as { data: Record<string, string> };

      expect(body.data).toEqual({
        jti: data.jti,
        ifId: "",
        platformCreatorId: "",
        platformCreatorUsername: "ghost",
        platformCreatorDisplayName: "ghost",
        email: "",
        whatsapp: ""
      });
    });

    it("rejects a request without a token", async () => {
      const baseUrl = await start();

      const response = await fetch(`${baseUrl}/account/me`);

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({ detail: "No AccessToken" });
    });
  });

  describe("protected routes", () => {
    it("asks for a token before reading an unparseable body", async () => {
      const baseUrl = await start();

      const response = await fetch(`${baseUrl}/account/logout`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{bad"
      });

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({ detail: "No AccessToken" });
    });

    it("rejects a token issued at login once it expires", async () => {
      let now = new Date(CREATED_AT);
      const baseUrl = await start({
        tokenCodec: new TokenCodec({ secret: TEST_SECRET, ttlDays: 14, clock: () => now })
      });
      const token = await loginToken(baseUrl);

      const fresh = await fetch(`${baseUrl}/account/me`, { headers: { [HEADER]: token } });
      now = new Date(now.getTime() + 15 * 24 * 60 * 60 * 1000);
      const stale = await fetch(`${baseUrl}/account/me`, { headers: { [HEADER]: token } });

      expect(fresh.status).toBe(200);
      expect(stale.status).toBe(401);
      expect(await stale.json()).toEqual({ detail: "AccessToken expired" });
    });
  });

  describe("session limit", () => {
    it("keeps five sessions and revokes the oldest on the sixth login", async () => {
      const baseUrl = await start();
      const tokens: string[] = [];
      for (let attempt = 0; attempt < 6; attempt += 1) {
        tokens.push(await loginToken(baseUrl));
      }

      const oldest = await fetch(`${baseUrl}/account/me`, { headers: { [HEADER]: tokens[0] } });
      const second = await fetch(`${baseUrl}/account/me`, { headers: { [HEADER]: tokens[1] } });
      const sessions = await fetch(`${baseUrl}/account/sessions`, { headers: { [HEADER]: tokens[5] } });
      const sessionsBody = (await sessions.json()) as {
        data: { sessions: Array<{ jti: string; current: boolean }> };
      };

      expect(oldest.status).toBe(401);
      expect(await oldest.json()).toEqual({ detail: "Invalid AccessToken (logged out or exceeded the limit)" });
      expect(second.status).toBe(200);
      expect(sessionsBody.data.sessions).toHaveLength(5);
      expect(sessionsBody.data.sessions.map((session) => session.current)).toEqual([false, false, false, false, true]);
    });
  });

  describe("POST /account/logout", () => {
    it("revokes the calling session while its token is still unexpired", async () => {
      const baseUrl = await start();
      const token = await loginToken(baseUrl);
      const otherToken = await loginToken(baseUrl);

      const logout = await fetch(`${baseUrl}/account/logout`, { method: "POST", headers: { [HEADER]: token } });
      const afterLogout = await fetch(`${baseUrl}/account/me`, { headers: { [HEADER]: token } });
      const otherSession = await fetch(`${baseUrl}/account/me`, { headers: { [HEADER]: otherToken } });

      expect(logout.status).toBe(200);
      expect(await logout.json()).toEqual({ code: 200, msg: "success", data: { loggedOut: true } });
      expect(afterLogout.status).toBe(401);
      expect(await afterLogout.json()).toEqual({ detail: "Invalid AccessToken (logged out or exceeded the limit)" });
      expect(otherSession.status).toBe(200);
    });
  });

  describe("public routes", () => {
    it("serves the service status at the root", async () => {
      const baseUrl = await start();

      const response = await fetch(`${baseUrl}/`);

      expect(await response.json()).toEqual({
        code: 200,
        msg: "success",
        data: { service: "creator-portal-api", status: "ok" }
      });
    });

    it("serves the API description and both documentation pages", async () => {
      const baseUrl = await start();

      const openApi = await fetch(`${baseUrl}/openapi.json`);
      const docs = await fetch(`${baseUrl}/docs`);
      const redoc = await fetch(`${baseUrl}/redoc`);

      expect(((await openApi.json()) as { openapi: string }).openapi).toBe("3.0.3");
      expect(docs.headers.get("content-type")).toContain("text/html");
      expect(await docs.text()).toContain('url: "/openapi.json"');
      expect(await redoc.text()).toContain('<redoc spec-url="/openapi.json"></redoc>');
    });

    it("returns 404 for an unknown route once authenticated", async () => {
      const baseUrl = await start();
      const token = await loginToken(baseUrl);

      const response = await fetch(`${baseUrl}/campaigns`, { headers: { [HEADER]: token } });

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({
        error: { code: "NOT_FOUND", message: "Route GET /campaigns not found" }
      });
    });
  });
});
