/**
 * Connection diagnostics: probe the board and explain what to fix.
 */
import { isErr, unwrapErr } from "option-t/plain_result";
import type { Logger } from "vite";
import type { BoardClient } from "../client.ts";
import { maskApiKey } from "../config.ts";
import { type BoardError, describeBoardError } from "../errors.ts";

export const GREETING = "Hello from the console!";

export interface CheckOptions {
  client: BoardClient;
  logger: Logger;
  /** Also post {@link GREETING} after a successful probe. */
  send?: boolean;
}

const RULE = "=".repeat(60);

function troubleshooting(host: string): string[] {
  return [
    "Troubleshooting steps:",
    `1. Verify your board is at: ${host || "(no host set)"}`,
    "2. Check VESTABOARD_API_KEY in .env.local",
    "3. Ensure the Local API is enabled on your board",
    `4. Try pinging the board: ping ${host || "<board-ip>"}`,
  ];
}

/** Returns true when every step passed. */
export async function runConnectionCheck(
  options: CheckOptions,
): Promise<boolean> {
  const { client, logger, send = false } = options;
  const { host, apiKey } = client.config;

  logger.info(RULE);
  logger.info("Vestaboard Connection Test");
  logger.info(RULE);
  logger.info(`Host: ${host || "(not set)"}`);
  logger.info(`API Key: ${apiKey ? maskApiKey(apiKey) : "(not set)"}`);

  const fail = (error: BoardError): false => {
    logger.error(`ERROR: ${describeBoardError(error)}`);
    for (const line of troubleshooting(host)) logger.info(line);
    logger.info(RULE);
    return false;
  };

  logger.info("Reading board state...");
  const probe = await client.testConnection();
  if (isErr(probe)) return fail(unwrapErr(probe));
  logger.info("Board reachable and API key accepted");

  if (send) {
    logger.info(`Sending test message "${GREETING}"...`);
    const sent = await client.sendMessage(GREETING);
    if (isErr(sent)) return fail(unwrapErr(sent));
    logger.info("Message sent");
  }

  logger.info("SUCCESS! Connection test passed.");
  logger.info(RULE);
  return true;
}
