import { createOk } from "option-t/plain_result";
import { describe, expect, it } from "vitest";
import { blankGrid } from "../src/board/grid.ts";
import { BoardClient } from "../src/client.ts";
import { loadBoardConfig } from "../src/config.ts";
import type { MetalsSource } from "../src/metals/kitco.ts";
import {
  type ApiContext,
  handleApiRequest,
  isApiPath,
} from "../src/server/api.ts";
import {
  MockTransport,
  type MockTransportOptions,
} from "../src/transport/index.ts";

const CONFIG = loadBoardConfig({
  VESTABOARD_API_KEY: "test-secret",
  VESTABOARD_HOST: "10.0.0.5",
});

const metals: MetalsSource = {
  fetchPrices: async () =>
    createOk({
      fetchedAt: new Date(2025, 9, 10, 15, 45),
      gold: { ask: 2, bid: 1, metal: "Gold" as const },
      silver: { ask: 4, bid: 3, metal: "Silver" as const },
    }),
};

function context(options: MockTransportOptions = {}): ApiContext {
  const transport = new MockTransport(
    { apiKey: CONFIG.apiKey, type: "mock" },
    options,
  );
  return { client: new BoardClient(CONFIG, transport), metals };
}

describe("handleApiRequest", () => {
  it("reports status without touching the board", async () => {
    const response = await handleApiRequest(context({ unreachable: true }), {
      body: undefined,
      method: "GET",
      path: "/api/status",
    });
    expect(response).toEqual({
      body: {
        data: { configured: true, host: "10.0.0.5", transport: "http" },
        ok: true,
      },
      status: 200,
    });
  });

  it("tests the connection", async () => {
    const response = await handleApiRequest(context(), {
      body: undefined,
      method: "POST",
      path: "/api/test",
    });
    expect(response).toEqual({
      body: {
        data: { message: "Successfully connected to board at 10.0.0.5" },
        ok: true,
      },
      status: 200,
    });
  });

  it("sends text and reads it back", async () => {
    const ctx = context();
    const sent = await handleApiRequest(ctx, {
      body: { text: "Hello World" },
      method: "POST",
      path: "/api/send",
    });
    expect(sent.status).toBe(200);
    expect(sent.body).toMatchObject({
      data: {
        lines: ["HELLO WORLD"],
        message: "Message sent successfully: Hello World",
        truncated: false,
      },
      ok: true,
    });

    const read = await handleApiRequest(ctx, {
      body: undefined,
      method: "GET",
      path: "/api/read",
    });
    expect(read.body).toMatchObject({ data: { text: "HELLO WORLD" }, ok: true });
  });

  it.each([
    [undefined, 'Missing "text"'],
    [{ text: 42 }, 'Missing "text"'],
    [{ text: "   " }, "Please enter a message"],
  ])("rejects send body %j", async (body, message) => {
    const response = await handleApiRequest(context(), {
      body,
      method: "POST",
      path: "/api/send",
    });
    expect(response).toEqual({
      body: {
        error: {
          hint: "Check the request body and try again.",
          kind: "BadRequest",
          message,
        },
        ok: false,
      },
      status: 400,
    });
  });

  it("maps format errors to 422 with a hint", async () => {
    const response = await handleApiRequest(context(), {
      body: { text: "A~B" },
      method: "POST",
      path: "/api/send",
    });
    expect(response).toEqual({
      body: {
        error: {
          hint: "Remove unsupported characters and try again.",
          kind: "FormatError",
          message: 'Unsupported characters: "~"',
        },
        ok: false,
      },
      status: 422,
    });
  });

  it("sends raw grids", async () => {
    const ok = await handleApiRequest(context(), {
      body: { codes: blankGrid() },
      method: "POST",
      path: "/api/raw",
    });
    expect(ok.body).toEqual({
      data: { message: "Raw message sent successfully" },
      ok: true,
    });

    const invalid = await handleApiRequest(context(), {
      body: { codes: [[1]] },
      method: "POST",
      path: "/api/raw",
    });
    expect(invalid.status).toBe(422);
    expect(invalid.body).toMatchObject({
      error: {
        kind: "InvalidGrid",
        message: "Invalid grid: expected 6 rows, got 1",
      },
    });

    const missing = await handleApiRequest(context(), {
      body: {},
      method: "POST",
      path: "/api/raw",
    });
    expect(missing.status).toBe(400);
    expect(missing.body).toMatchObject({
      error: { message: 'Missing "codes" grid' },
    });
  });

  it("posts metals prices", async () => {
    const response = await handleApiRequest(context(), {
      body: undefined,
      method: "POST",
      path: "/api/metals",
    });
    expect(response.body).toEqual({
      data: {
        lines: [
          "GOLD  BID:1.00",
          "      ASK:2.00",
          "",
          "SILVER BID:3.00",
          "       ASK:4.00",
          "OCTOBER 10 03:45 PM",
        ],
        message: "Metals prices sent to the board",
      },
      ok: true,
    });
  });

  it("maps board failures to gateway and availability errors", async () => {
    const auth = await handleApiRequest(context({ acceptedKey: "other-key" }), {
      body: undefined,
      method: "POST",
      path: "/api/test",
    });
    expect(auth.status).toBe(502);
    expect(auth.body).toMatchObject({
      error: {
        hint: "Check your API key. Use the Local API key, not the enablement token.",
        kind: "AuthFailed",
      },
    });

    const down = await handleApiRequest(context({ unreachable: true }), {
      body: undefined,
      method: "GET",
      path: "/api/read",
    });
    expect(down.status).toBe(502);
    expect(down.body).toMatchObject({ error: { kind: "ConnectionFailed" } });

    const unconfigured: ApiContext = {
      client: new BoardClient(loadBoardConfig({})),
      metals,
    };
    const missing = await handleApiRequest(unconfigured, {
      body: undefined,
      method: "POST",
      path: "/api/test",
    });
    expect(missing.status).toBe(503);
    expect(missing.body).toMatchObject({
      error: {
        hint: "Set VESTABOARD_HOST and VESTABOARD_API_KEY in .env.local and restart.",
        kind: "NotConfigured",
      },
    });
  });

  it("answers unknown routes and wrong methods", async () => {
    const unknown = await handleApiRequest(context(), {
      body: undefined,
      method: "GET",
      path: "/api/nope",
    });
    expect(unknown.status).toBe(404);
    expect(unknown.body).toMatchObject({
      error: { kind: "NotFound", message: "No route for /api/nope" },
    });

    const wrongMethod = await handleApiRequest(context(), {
      body: undefined,
      method: "GET",
      path: "/api/send",
    });
    expect(wrongMethod.status).toBe(405);
    expect(wrongMethod.body).toMatchObject({
      error: {
        kind: "MethodNotAllowed",
        message: "/api/send expects POST, got GET",
      },
    });
  });
});

describe("isApiPath", () => {
  it("matches the prefix only", () => {
    expect(isApiPath("/api")).toBe(true);
    expect(isApiPath("/api/send")).toBe(true);
    expect(isApiPath("/apix")).toBe(false);
    expect(isApiPath("/")).toBe(false);
  });
});
