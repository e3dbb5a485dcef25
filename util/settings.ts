import { paramError } from "./errors";

export interface IDownloadSettings {
  maxConcurrency: number; // parallel segment fetches
  maxRetries: number; // retries after the first attempt
  retryBaseDelayMs: number; // attempt N waits N * this
  requestTimeoutMs: number; // deadline of a single fetch
  userAgent: string;
}

export const DEFAULT_SETTINGS: Readonly<IDownloadSettings> = {
  maxConcurrency: 10,
  maxRetries: 5,
  retryBaseDelayMs: 2000,
  requestTimeoutMs: 30000,
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36",
};

function checkInteger(name: keyof IDownloadSettings, value: unknown, min: number): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw paramError("First", `settings.${name}`, "resolveSettings()", "integer");
  }
  if (value < min) {
    throw new RangeError(`settings.${name} must be >= ${min}, got ${value}`);
  }
  return value;
}

export function resolveSettings(opts: Partial<IDownloadSettings> = {}): IDownloadSettings {
  const merged = { ...DEFAULT_SETTINGS, ...opts };
  if (typeof merged.userAgent !== "string") {
    throw paramError("First", "settings.userAgent", "resolveSettings()", "string");
  }
  return {
    maxConcurrency: checkInteger("maxConcurrency", merged.maxConcurrency, 1),
    maxRetries: checkInteger("maxRetries", merged.maxRetries, 0),
    retryBaseDelayMs: checkInteger("retryBaseDelayMs", merged.retryBaseDelayMs, 0),
    requestTimeoutMs: checkInteger("requestTimeoutMs", merged.requestTimeoutMs, 1),
    userAgent: merged.userAgent,
  };
}
