import { createWriteStream } from "fs";
import { pipeline } from "stream/promises";
import nodeFetch, { Response } from "node-fetch";
import Debug from "debug";
import {
  FetchError,
  OperationCancelled,
  TransientFetchError,
} from "./errors";
import { IDownloadSettings } from "./settings";
const debug = Debug("hls-archiver:fetcher");

// Edge caches (mostly Cloudflare and friends) answer with these while the origin hiccups
export const TRANSIENT_STATUS_CODES: ReadonlySet<number> = new Set([
  502, 503, 504, 520, 521, 522, 524,
]);

export interface IFetchedText {
  text: string;
  url: string; // final URL after redirects
}

export interface IFetcher {
  fetchText(url: string, signal?: AbortSignal): Promise<IFetchedText>;
  fetchToFile(url: string, destination: string, signal?: AbortSignal): Promise<void>;
}

export function isTransient(err: unknown): boolean {
  return err instanceof TransientFetchError;
}

export class HttpFetcher implements IFetcher {
  requestTimeoutMs: number;
  userAgent: string;

  constructor(settings: Pick<IDownloadSettings, "requestTimeoutMs" | "userAgent">) {
    this.requestTimeoutMs = settings.requestTimeoutMs;
    this.userAgent = settings.userAgent;
  }

  async fetchText(url: string, signal?: AbortSignal): Promise<IFetchedText> {
    return this._withDeadline(url, signal, async (requestSignal) => {
      const response = await this._get(url, requestSignal);
      const text = await response.text();
      return { text: text, url: response.url || url };
    });
  }

  async fetchToFile(url: string, destination: string, signal?: AbortSignal): Promise<void> {
    return this._withDeadline(url, signal, async (requestSignal) => {
      const response = await this._get(url, requestSignal);
      await pipeline(response.body, createWriteStream(destination));
    });
  }

  async _get(url: string, signal: AbortSignal): Promise<Response> {
    const response = await nodeFetch(url, {
      method: "GET",
      redirect: "follow",
      signal: signal,
      headers: { "User-Agent": this.userAgent },
    });
    if (response.ok) {
      return response;
    }
    const msg = `Request to ${url} returned status code ${response.status}`;
    debug(msg);
    if (TRANSIENT_STATUS_CODES.has(response.status)) {
      throw new TransientFetchError(msg, response.status);
    }
    throw new FetchError(msg, response.status);
  }

  /**
   * Runs a request under its own deadline. The job signal, when given, is
   * chained in so that cancelling the job aborts the request as well.
   */
  async _withDeadline<T>(
    url: string,
    jobSignal: AbortSignal | undefined,
    request: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    if (jobSignal && jobSignal.aborted) {
      throw new OperationCancelled();
    }
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      debug(`Request Timeout! Aborting Request to ${url}`);
      timedOut = true;
      controller.abort();
    }, this.requestTimeoutMs);
    const onJobAbort = () => controller.abort();
    if (jobSignal) {
      jobSignal.addEventListener("abort", onJobAbort, { once: true });
    }

    try {
      return await request(controller.signal);
    } catch (err) {
      if (jobSignal && jobSignal.aborted) {
        throw new OperationCancelled();
      }
      if (err instanceof TransientFetchError || err instanceof FetchError) {
        throw err;
      }
      if (timedOut) {
        throw new TransientFetchError(
          `Request to ${url} timed out after ${this.requestTimeoutMs}ms`,
          undefined,
          err
        );
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransientFetchError(`Request to ${url} failed: ${reason}`, undefined, err);
    } finally {
      clearTimeout(timeout);
      if (jobSignal) {
        jobSignal.removeEventListener("abort", onJobAbort);
      }
    }
  }
}
