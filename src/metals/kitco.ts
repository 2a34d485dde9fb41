/**
 * Gold and Silver spot quotes from Kitco chart pages.
 *
 * The chart pages embed their data as Next.js `__NEXT_DATA__` JSON; the
 * quote is the first `metalQuote` query's `GetMetalQuoteV3.results[0]`.
 */
import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapOk,
} from "option-t/plain_result";
import { ConnectionFailedError } from "../errors.ts";
import type { FetchFn } from "../transport/http-transport.ts";

export type MetalName = "Gold" | "Silver";

export interface MetalQuote {
  metal: MetalName;
  bid: number;
  ask: number;
}

export interface MetalsSnapshot {
  gold: MetalQuote;
  silver: MetalQuote;
  fetchedAt: Date;
}

export interface MetalsSource {
  fetchPrices(): Promise<Result<MetalsSnapshot, ConnectionFailedError>>;
}

export interface KitcoSourceOptions {
  fetchFn?: FetchFn;
  /** Per page request bound (default 15000 ms). */
  timeoutMs?: number;
  now?: () => Date;
}

export const KITCO_CHART_URLS: Record<MetalName, string> = {
  Gold: "https://www.kitco.com/charts/gold",
  Silver: "https://www.kitco.com/charts/silver",
};

export const KITCO_DOWN_MESSAGE =
  "kitco.com website down. Precious metals SPOT PRICES are NOT UP TO DATE.";
export const KITCO_PARSE_MESSAGE = "Failed to extract price data from Kitco";

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const NEXT_DATA =
  /<script[^>]*\bid=["']__NEXT_DATA__["'][^>]*>([\s\S]*?)<\/script>/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

function path(value: unknown, keys: string[]): unknown {
  return keys.reduce<unknown>((acc, key) => field(acc, key), value);
}

/** Pull the bid/ask quote out of a chart page, or `null` if absent. */
export function extractQuote(
  html: string,
  metal: MetalName,
): MetalQuote | null {
  const match = NEXT_DATA.exec(html);
  if (!match?.[1]) return null;

  let data: unknown;
  try {
    data = JSON.parse(match[1]);
  } catch {
    return null;
  }

  const queries = path(data, [
    "props",
    "pageProps",
    "dehydratedState",
    "queries",
  ]);
  if (!Array.isArray(queries)) return null;

  for (const query of queries) {
    const key = field(query, "queryKey");
    if (!Array.isArray(key) || key[0] !== "metalQuote") continue;
    const results = path(query, [
      "state",
      "data",
      "GetMetalQuoteV3",
      "results",
    ]);
    if (!Array.isArray(results) || results.length === 0) continue;
    const bid = field(results[0], "bid");
    const ask = field(results[0], "ask");
    if (typeof bid !== "number" || typeof ask !== "number") return null;
    return { ask, bid, metal };
  }
  return null;
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

async function fetchQuote(
  metal: MetalName,
  fetchFn: FetchFn,
  timeoutMs: number,
): Promise<Result<MetalQuote, ConnectionFailedError>> {
  let html: string;
  try {
    const response = await fetchFn(KITCO_CHART_URLS[metal], {
      headers: { "User-Agent": USER_AGENT },
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      return createErr(
        new ConnectionFailedError(
          `Kitco answered HTTP ${response.status} for ${metal.toLowerCase()}`,
        ),
      );
    }
    html = await response.text();
  } catch (error) {
    if (isTimeout(error)) {
      return createErr(
        new ConnectionFailedError(KITCO_DOWN_MESSAGE, { cause: error }),
      );
    }
    const reason = error instanceof Error ? error.message : String(error);
    return createErr(
      new ConnectionFailedError(`Network error: ${reason}`, { cause: error }),
    );
  }

  const quote = extractQuote(html, metal);
  return quote
    ? createOk(quote)
    : createErr(new ConnectionFailedError(KITCO_PARSE_MESSAGE));
}

/** Metals source backed by the Kitco chart pages. */
export function createKitcoSource(
  options: KitcoSourceOptions = {},
): MetalsSource {
  const { fetchFn = fetch, timeoutMs = 15000, now = () => new Date() } =
    options;
  return {
    async fetchPrices() {
      const gold = await fetchQuote("Gold", fetchFn, timeoutMs);
      if (isErr(gold)) return gold;
      const silver = await fetchQuote("Silver", fetchFn, timeoutMs);
      if (isErr(silver)) return silver;
      return createOk({
        fetchedAt: now(),
        gold: unwrapOk(gold),
        silver: unwrapOk(silver),
      });
    },
  };
}

const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

/** `2345.6` → `2,345.60` */
export function formatPrice(value: number): string {
  return value.toLocaleString("en-US", {
    maximumFractionDigits: 2,
    minimumFractionDigits: 2,
  });
}

/** `October 10 03:45 PM` in local time. */
export function formatQuoteTime(date: Date): string {
  const hours = date.getHours();
  const hh = String(hours % 12 === 0 ? 12 : hours % 12).padStart(2, "0");
  const mm = String(date.getMinutes()).padStart(2, "0");
  const meridiem = hours < 12 ? "AM" : "PM";
  return `${MONTHS[date.getMonth()]} ${date.getDate()} ${hh}:${mm} ${meridiem}`;
}

/** Six board lines, meant for left-aligned layout. */
export function formatMetalsBoard(snapshot: MetalsSnapshot): string[] {
  return [
    `GOLD  BID:${formatPrice(snapshot.gold.bid)}`,
    `      ASK:${formatPrice(snapshot.gold.ask)}`,
    "",
    `SILVER BID:${formatPrice(snapshot.silver.bid)}`,
    `       ASK:${formatPrice(snapshot.silver.ask)}`,
    formatQuoteTime(snapshot.fetchedAt),
  ];
}
