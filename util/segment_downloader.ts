import { EventEmitter } from "events";
import { promises as fs } from "fs";
import path from "path";
import Debug from "debug";
import {
  InvalidPlaylistError,
  OperationCancelled,
  SegmentFailure,
  isCancellation,
} from "./errors";
import { HttpFetcher, IFetcher, isTransient } from "./fetcher";
import { OrderedAccumulator, Semaphore } from "./gate";
import { FFmpegMerger, IMerger, removeQuietly } from "./merger";
import { DownloadPhase, IDownloadProgress, Playlist, Segment } from "./playlist_model";
import { IDownloadSettings, resolveSettings } from "./settings";
const debug = Debug("hls-archiver:downloader");

export interface IDownloadResult {
  outputPath: string;
  segmentFiles: string[]; // playlist order, as handed to the merger
}

export interface IDownloadOptions {
  outputFileName?: string;
  signal?: AbortSignal;
}

export interface IAppendOptions {
  signal?: AbortSignal;
  startIndex?: number; // file numbering offset when appending to an existing scratch dir
  onSegment?: (downloaded: number) => void;
}

export interface IEngineDependencies {
  fetcher?: IFetcher;
  merger?: IMerger;
}

const KNOWN_SEGMENT_EXTENSIONS = [".ts", ".m4s", ".mp4", ".aac", ".m4a", ".vtt"];

export function segmentFileName(index: number, url: string): string {
  const candidate = path.posix.extname(url.split(/[?#]/)[0]).toLowerCase();
  const ext = KNOWN_SEGMENT_EXTENSIONS.includes(candidate) ? candidate : ".ts";
  return `segment_${String(index).padStart(5, "0")}${ext}`;
}

/**
 * Downloads every segment of a media playlist with bounded concurrency and
 * per-segment retries, then hands the files, in playlist order, to a merger.
 *
 * Emits:
 *  - "progress" (IDownloadProgress) after every finished segment and on
 *    every phase change, ending with exactly one terminal phase.
 */
export class SegmentDownloadOrchestrator extends EventEmitter {
  settings: IDownloadSettings;
  fetcher: IFetcher;
  merger: IMerger;

  constructor(settings: Partial<IDownloadSettings> = {}, deps: IEngineDependencies = {}) {
    super();
    this.settings = resolveSettings(settings);
    this.fetcher = deps.fetcher || new HttpFetcher(this.settings);
    this.merger = deps.merger || new FFmpegMerger();
  }

  async download(
    playlist: Playlist,
    destinationDir: string,
    opts: IDownloadOptions = {}
  ): Promise<IDownloadResult> {
    if (playlist.isMaster) {
      throw new InvalidPlaylistError(
        "Cannot download a master playlist, select a variant and load its media playlist first"
      );
    }
    if (playlist.segments.length === 0) {
      throw new InvalidPlaylistError("Playlist contains no segments");
    }
    const outputPath = path.join(destinationDir, opts.outputFileName || "output.mp4");
    const progress: IDownloadProgress = {
      totalSegments: playlist.segments.length,
      downloadedSegments: 0,
      phase: DownloadPhase.INITIALIZING,
    };

    await fs.mkdir(destinationDir, { recursive: true });
    const scratchDir = await fs.mkdtemp(path.join(destinationDir, ".hls-"));
    debug(`Starting download of ${playlist.baseUrl} into ${outputPath} (scratch: ${scratchDir})`);
    this._report(progress);

    let mergeStarted = false;
    try {
      progress.phase = DownloadPhase.DOWNLOADING;
      this._report(progress);
      const segmentFiles = await this.downloadSegments(playlist.segments, scratchDir, {
        signal: opts.signal,
        onSegment: (downloaded) => {
          progress.downloadedSegments = downloaded;
          this._report(progress);
        },
      });

      progress.phase = DownloadPhase.MERGING;
      this._report(progress);
      mergeStarted = true;
      await this.merger.merge(segmentFiles, outputPath, opts.signal);

      debug(`Download and merge completed: ${outputPath}`);
      progress.phase = DownloadPhase.COMPLETED;
      this._report(progress);
      return { outputPath: outputPath, segmentFiles: segmentFiles };
    } catch (err) {
      if (mergeStarted) {
        await removeQuietly(outputPath);
      }
      if (isCancellation(err)) {
        debug(`Download cancelled`);
        progress.phase = DownloadPhase.CANCELLED;
      } else {
        debug(`Download failed for playlist ${playlist.baseUrl}: ${err}`);
        progress.phase = DownloadPhase.FAILED;
      }
      this._report(progress);
      throw err;
    } finally {
      debug(`Cleaning up scratch directory: ${scratchDir}`);
      await removeQuietly(scratchDir);
    }
  }

  /**
   * Downloads segments into an existing directory and returns their paths in
   * playlist order. On failure or cancellation only the files written by this
   * call are removed, so callers can keep appending batches to one directory.
   */
  async downloadSegments(
    segments: readonly Segment[],
    scratchDir: string,
    opts: IAppendOptions = {}
  ): Promise<string[]> {
    const startIndex = opts.startIndex || 0;
    const gate = new Semaphore(this.settings.maxConcurrency);
    const results = new OrderedAccumulator();
    const written: string[] = [];

    // Aborted by the caller, or by us as soon as one segment fails for good
    const job = new AbortController();
    const onCallerAbort = () => job.abort();
    if (opts.signal) {
      if (opts.signal.aborted) {
        throw new OperationCancelled();
      }
      opts.signal.addEventListener("abort", onCallerAbort, { once: true });
    }

    const failures: unknown[] = [];
    const tasks = segments.map(async (segment, i) => {
      const index = startIndex + i;
      if (!segment.url) {
        debug(`Skipping segment ${index} due to an unresolved URL`);
        return;
      }
      await gate.acquire(job.signal);
      try {
        const file = path.join(scratchDir, segmentFileName(index, segment.url));
        written.push(file);
        await this._fetchWithRetry(segment.url, file, index, job.signal);
        const downloaded = results.record(index, file);
        if (opts.onSegment) {
          opts.onSegment(downloaded);
        }
      } catch (err) {
        if (!isCancellation(err)) {
          failures.push(err);
          job.abort();
        }
        throw err;
      } finally {
        gate.release();
      }
    });

    try {
      await Promise.allSettled(tasks);
    } finally {
      if (opts.signal) {
        opts.signal.removeEventListener("abort", onCallerAbort);
      }
    }

    if ((opts.signal && opts.signal.aborted) || failures.length > 0) {
      await Promise.all(written.map((file) => removeQuietly(file)));
      if (opts.signal && opts.signal.aborted) {
        throw new OperationCancelled();
      }
      throw failures[0];
    }
    return results.paths();
  }

  async _fetchWithRetry(url: string, file: string, index: number, signal: AbortSignal): Promise<void> {
    const maxRetries = this.settings.maxRetries;
    for (let attempt = 0; ; attempt++) {
      if (signal.aborted) {
        throw new OperationCancelled();
      }
      if (attempt > 0) {
        debug(`Retrying segment ${index} download (attempt ${attempt + 1}/${maxRetries + 1})`);
        await this._timer(this.settings.retryBaseDelayMs * attempt, signal);
      }
      try {
        await this.fetcher.fetchToFile(url, file, signal);
        return;
      } catch (err) {
        if (isCancellation(err)) {
          throw err;
        }
        if (!isTransient(err)) {
          throw new SegmentFailure(index, `Failed to download segment ${index} from ${url}: ${err}`, err);
        }
        if (attempt >= maxRetries) {
          debug(`Failed to download segment ${index} after ${attempt + 1} attempts`);
          throw new SegmentFailure(
            index,
            `Failed to download segment ${index} after ${attempt + 1} attempts: ${err}`,
            err
          );
        }
        debug(`Transient error on segment ${index}: ${err}`);
      }
    }
  }

  _timer(ms: number, signal?: AbortSignal): Promise<void> {
    return sleep(ms, signal);
  }

  _report(progress: IDownloadProgress): void {
    this.emit("progress", { ...progress });
  }
}

// Resolves after ms, or rejects with OperationCancelled as soon as the signal fires
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal && signal.aborted) {
      reject(new OperationCancelled());
      return;
    }
    const onAbort = () => {
      clearTimeout(timeout);
      reject(new OperationCancelled());
    };
    const timeout = setTimeout(() => {
      if (signal) {
        signal.removeEventListener("abort", onAbort);
      }
      resolve();
    }, ms);
    if (signal) {
      signal.addEventListener("abort", onAbort, { once: true });
    }
  });
}
