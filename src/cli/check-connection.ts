// Usage: npm run check [-- --send]
// Reads the same .env files as the web console.
import { createLogger, loadEnv } from "vite";
import { BoardClient } from "../client.ts";
import { ENV_PREFIX, loadBoardConfig } from "../config.ts";
import { runConnectionCheck } from "./check.ts";

const mode = process.env.NODE_ENV ?? "development";
const env = loadEnv(mode, process.cwd(), ENV_PREFIX);
const client = new BoardClient(loadBoardConfig(env));

const passed = await runConnectionCheck({
  client,
  logger: createLogger("info"),
  send: process.argv.includes("--send"),
});
process.exitCode = passed ? 0 : 1;
