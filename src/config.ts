/**
 * Board connection settings.
 *
 * Built once at startup from environment variables (Vite's `loadEnv` reads
 * `.env`, `.env.local` and `.env.[mode]`) and passed explicitly into the
 * client. The value is frozen; nothing reads the environment afterwards.
 */

export type BoardTransportType = "http" | "mock";

export interface BoardConfig {
  /** Board address: `10.0.0.5`, `10.0.0.5:7000` or `http://10.0.0.5:7000`. */
  readonly host: string;
  /** Local API key. */
  readonly apiKey: string;
  /** Upper bound for a single request, in milliseconds. */
  readonly timeoutMs: number;
  readonly transport: BoardTransportType;
}

export type BoardEnv = Record<string, string | undefined>;

export const ENV_PREFIX = "VESTABOARD_";
export const DEFAULT_TIMEOUT_MS = 5000;
export const LOCAL_API_PORT = 7000;

// Values shipped in .env.example and common stand-ins.
const PLACEHOLDERS = new Set([
  "your api key here",
  "your_api_key",
  "your-api-key",
  "your board ip here",
  "changeme",
  "xxx",
]);

function parseTimeout(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") return DEFAULT_TIMEOUT_MS;
  const ms = Number.parseInt(raw, 10);
  // A finite positive bound is required; fall back rather than disable it.
  return Number.isFinite(ms) && ms > 0 ? ms : DEFAULT_TIMEOUT_MS;
}

function parseTransport(raw: string | undefined): BoardTransportType {
  return raw?.trim().toLowerCase() === "mock" ? "mock" : "http";
}

/** Build a frozen {@link BoardConfig} from environment variables. */
export function loadBoardConfig(env: BoardEnv): BoardConfig {
  return Object.freeze({
    apiKey: (env.VESTABOARD_API_KEY ?? "").trim(),
    host: (env.VESTABOARD_HOST ?? "").trim(),
    timeoutMs: parseTimeout(env.VESTABOARD_TIMEOUT_MS),
    transport: parseTransport(env.VESTABOARD_TRANSPORT),
  });
}

export function isPlaceholder(value: string): boolean {
  const v = value.trim();
  return v === "" || PLACEHOLDERS.has(v.toLowerCase());
}

/** True when host and API key are both filled in with real values. */
export function isConfigured(config: BoardConfig): boolean {
  return !isPlaceholder(config.host) && !isPlaceholder(config.apiKey);
}

/**
 * Base URL of the board's Local API. Scheme defaults to `http` and port
 * to {@link LOCAL_API_PORT}. `null` when the host is not a valid address.
 */
export function baseUrlFor(host: string): string | null {
  const withScheme = /^https?:\/\//i.test(host) ? host : `http://${host}`;
  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    return null;
  }
  if (url.port === "") url.port = String(LOCAL_API_PORT);
  return `${url.protocol}//${url.host}`;
}

/** API key with all but the first few characters hidden, for logs. */
export function maskApiKey(apiKey: string): string {
  if (apiKey.length <= 4) return "****";
  return `${apiKey.slice(0, 4)}...`;
}
