import { createLogger } from "vite";
import { describe, expect, it, vi } from "vitest";
import { gridToText } from "../src/board/grid.ts";
import { runConnectionCheck } from "../src/cli/check.ts";
import { BoardClient } from "../src/client.ts";
import { type BoardEnv, loadBoardConfig } from "../src/config.ts";
import {
  MockTransport,
  type MockTransportOptions,
} from "../src/transport/index.ts";

const RULE = "=".repeat(60);

function setup(
  env: BoardEnv = {
    VESTABOARD_API_KEY: "test-secret",
    VESTABOARD_HOST: "10.0.0.5",
  },
  options: MockTransportOptions = {},
) {
  const logger = createLogger("silent");
  const info = vi.spyOn(logger, "info");
  const error = vi.spyOn(logger, "error");
  const transport = new MockTransport(
    { apiKey: "test-secret", type: "mock" },
    options,
  );
  const client = new BoardClient(loadBoardConfig(env), transport);
  const lines = () => info.mock.calls.map(([message]) => message);
  return { client, error, lines, logger, transport };
}

describe("runConnectionCheck", () => {
  it("probes the board and reports success", async () => {
    const { client, lines, logger, transport } = setup();
    expect(await runConnectionCheck({ client, logger })).toBe(true);
    expect(lines()).toEqual([
      RULE,
      "Vestaboard Connection Test",
      RULE,
      "Host: 10.0.0.5",
      "API Key: test...",
      "Reading board state...",
      "Board reachable and API key accepted",
      "SUCCESS! Connection test passed.",
      RULE,
    ]);
    expect(transport.requests.map((r) => r.method)).toEqual(["GET"]);
  });

  it("optionally posts a greeting", async () => {
    const { client, lines, logger, transport } = setup();
    expect(await runConnectionCheck({ client, logger, send: true })).toBe(true);
    expect(lines()).toContain('Sending test message "Hello from the console!"...');
    expect(gridToText(transport.currentGrid)).toBe(
      "HELLO FROM THE\nCONSOLE!",
    );
  });

  it("explains a rejected key", async () => {
    const { client, error, lines, logger } = setup(undefined, {
      acceptedKey: "other-key",
    });
    expect(await runConnectionCheck({ client, logger, send: true })).toBe(
      false,
    );
    expect(error).toHaveBeenCalledWith(
      "ERROR: Board rejected the API key (HTTP 401). Check your API key. Use the Local API key, not the enablement token.",
    );
    expect(lines()).toContain("1. Verify your board is at: 10.0.0.5");
    expect(lines()).not.toContain("SUCCESS! Connection test passed.");
  });

  it("explains missing configuration", async () => {
    const { client, error, lines, logger, transport } = setup({});
    expect(await runConnectionCheck({ client, logger })).toBe(false);
    expect(lines().slice(3, 5)).toEqual([
      "Host: (not set)",
      "API Key: (not set)",
    ]);
    expect(error).toHaveBeenCalledWith(
      "ERROR: Board client is not configured: host and API key are required. Set VESTABOARD_HOST and VESTABOARD_API_KEY in .env.local and restart.",
    );
    expect(lines()).toContain("4. Try pinging the board: ping <board-ip>");
    expect(transport.requests).toHaveLength(0);
  });
});
