import { EventEmitter } from "events";
import { promises as fs } from "fs";
import path from "path";
import Debug from "debug";
import { InvalidPlaylistError, isCancellation } from "./errors";
import { IMerger, removeQuietly } from "./merger";
import { PlaylistLoader } from "./playlist_loader";
import { DownloadPhase, IDownloadProgress, Playlist, Segment } from "./playlist_model";
import { IEngineDependencies, SegmentDownloadOrchestrator, sleep } from "./segment_downloader";
import { IDownloadSettings } from "./settings";
const debug = Debug("hls-archiver:recorder");

export enum RecorderState {
  IDLE = "Idle",
  RECORDING = "Recording",
  STOPPED = "Stopped",
  CANCELLED = "Cancelled",
  FAILED = "Failed",
}

export interface IRecordOptions {
  maxDurationSeconds?: number; // 0 or unset: record until stopped, cancelled or ended
  pollIntervalMs?: number; // defaults to the target duration
  outputFileName?: string;
  playlistUrl?: string; // defaults to the initial playlist's base URL
  signal?: AbortSignal;
}

export interface IRecordingResult {
  state: RecorderState;
  outputPath: string | null; // null when nothing was captured
  segmentFiles: string[];
  highestSequenceSeen: number;
}

const DEFAULT_POLL_INTERVAL_MS = 6000;

/*
 * Keeps polling a live media playlist and downloads each segment the first
 * time its sequence number shows up. Whatever the initial playlist already
 * lists counts as seen, so capture starts with the first refresh. All
 * captured files go into one scratch directory and are merged once, when the
 * recording ends.
 *
 * Emits "state" (RecorderState), "segments" (Segment[] new in this poll) and
 * "progress" (IDownloadProgress).
 */
export class LiveStreamRecorder extends EventEmitter {
  state: RecorderState;
  highestSequenceSeen: number;
  orchestrator: SegmentDownloadOrchestrator;
  loader: PlaylistLoader;
  merger: IMerger;
  private wake: AbortController | null;

  constructor(settings: Partial<IDownloadSettings> = {}, deps: IEngineDependencies = {}) {
    super();
    this.state = RecorderState.IDLE;
    this.highestSequenceSeen = -1;
    this.orchestrator = new SegmentDownloadOrchestrator(settings, deps);
    this.loader = new PlaylistLoader(settings, this.orchestrator.fetcher);
    this.merger = this.orchestrator.merger;
    this.wake = null;
  }

  async record(
    initialPlaylist: Playlist,
    destinationDir: string,
    opts: IRecordOptions = {}
  ): Promise<IRecordingResult> {
    if (this.state === RecorderState.RECORDING) {
      throw new Error("Recorder is already recording");
    }
    if (initialPlaylist.isMaster) {
      throw new InvalidPlaylistError("Cannot record a master playlist, select a variant first");
    }
    const playlistUrl = opts.playlistUrl || initialPlaylist.baseUrl;
    const pollIntervalMs =
      opts.pollIntervalMs !== undefined
        ? opts.pollIntervalMs
        : initialPlaylist.targetDuration > 0
        ? initialPlaylist.targetDuration * 1000
        : DEFAULT_POLL_INTERVAL_MS;
    const maxDurationMs = (opts.maxDurationSeconds || 0) * 1000;
    const outputPath = path.join(destinationDir, opts.outputFileName || "recording.ts");
    const signal = opts.signal;
    const initialSegments = initialPlaylist.segments;

    // Claimed before the first await so a second record() call is refused
    this.highestSequenceSeen =
      initialSegments.length > 0 ? initialSegments[initialSegments.length - 1].sequenceNumber : -1;
    this._setState(RecorderState.RECORDING);

    // Fires on stop() and on cancellation, cutting poll sleeps short
    const wake = new AbortController();
    const onCancel = () => wake.abort();
    if (signal && signal.aborted) {
      wake.abort();
    } else if (signal) {
      signal.addEventListener("abort", onCancel, { once: true });
    }
    this.wake = wake;

    let scratchDir: string;
    try {
      await fs.mkdir(destinationDir, { recursive: true });
      scratchDir = await fs.mkdtemp(path.join(destinationDir, ".hls-live-"));
    } catch (err) {
      if (signal) {
        signal.removeEventListener("abort", onCancel);
      }
      this.wake = null;
      this._setState(RecorderState.FAILED);
      throw err;
    }

    const captured: string[] = [];
    // Every index handed out, skipped segments included, so batches never share a file name
    let nextFileIndex = 0;
    const progress: IDownloadProgress = {
      totalSegments: 0,
      downloadedSegments: 0,
      phase: DownloadPhase.INITIALIZING,
    };
    this._report(progress);
    debug(
      `Recording ${playlistUrl} into ${outputPath} from sequence ${this.highestSequenceSeen + 1} (scratch: ${scratchDir})`
    );

    let mergeStarted = false;
    try {
      progress.phase = DownloadPhase.DOWNLOADING;
      this._report(progress);
      const startedAt = this._now();
      let iterationStart = startedAt;
      let playlist = initialPlaylist;

      while (true) {
        try {
          if (!playlist.isLive) {
            debug(`Source playlist got an end-list tag. Stopping recording.`);
            break;
          }
          const elapsed = this._now() - startedAt;
          if (maxDurationMs > 0 && elapsed >= maxDurationMs) {
            debug(`Target recording duration of ${maxDurationMs}ms is reached (${elapsed}ms)`);
            break;
          }
          if (wake.signal.aborted) {
            break;
          }

          let tickInterval = pollIntervalMs - (this._now() - iterationStart);
          tickInterval = tickInterval < 2 ? 2 : tickInterval;
          debug(`Going to poll again after ${tickInterval}ms`);
          try {
            await this._timer(tickInterval, wake.signal);
          } catch (err) {
            if (!isCancellation(err)) {
              throw err;
            }
          }
          if (wake.signal.aborted) {
            break;
          }

          iterationStart = this._now();
          playlist = await this.loader.loadPlaylist(playlistUrl, signal);
          if (playlist.isMaster) {
            throw new InvalidPlaylistError(`${playlistUrl} turned into a master playlist`);
          }
          const fresh = this._newSegments(playlist);
          if (fresh.length > 0) {
            progress.totalSegments += fresh.length;
            const alreadyCaptured = captured.length;
            const startIndex = nextFileIndex;
            nextFileIndex += fresh.length;
            const files = await this.orchestrator.downloadSegments(fresh, scratchDir, {
              signal: signal,
              startIndex: startIndex,
              onSegment: (downloaded) => {
                progress.downloadedSegments = alreadyCaptured + downloaded;
                this._report(progress);
              },
            });
            captured.push(...files);
            this.highestSequenceSeen = Math.max(
              this.highestSequenceSeen,
              ...fresh.map((s) => s.sequenceNumber)
            );
            this.emit("segments", fresh);
          }
        } catch (err) {
          if (isCancellation(err) && signal && signal.aborted) {
            break;
          }
          throw err;
        }
      }

      const outcome =
        signal && signal.aborted ? RecorderState.CANCELLED : RecorderState.STOPPED;
      let mergedPath: string | null = null;
      if (captured.length > 0) {
        progress.phase = DownloadPhase.MERGING;
        this._report(progress);
        mergeStarted = true;
        await this.merger.merge(captured, outputPath);
        mergedPath = outputPath;
      } else {
        debug(`Nothing was captured, skipping merge`);
      }

      progress.phase =
        outcome === RecorderState.CANCELLED ? DownloadPhase.CANCELLED : DownloadPhase.COMPLETED;
      this._report(progress);
      this._setState(outcome);
      return {
        state: outcome,
        outputPath: mergedPath,
        segmentFiles: captured,
        highestSequenceSeen: this.highestSequenceSeen,
      };
    } catch (err) {
      debug(`Recording failed: ${err}`);
      if (mergeStarted) {
        await removeQuietly(outputPath);
      }
      progress.phase = DownloadPhase.FAILED;
      this._report(progress);
      this._setState(RecorderState.FAILED);
      throw err;
    } finally {
      if (signal) {
        signal.removeEventListener("abort", onCancel);
      }
      this.wake = null;
      await removeQuietly(scratchDir);
    }
  }

  // Ends the recording after the current poll; what was captured gets merged
  stop(): void {
    if (this.wake) {
      debug(`Stop requested`);
      this.wake.abort();
    }
  }

  _newSegments(playlist: Playlist): Segment[] {
    const segments = playlist.segments;
    if (segments.length > 0) {
      const last = segments[segments.length - 1].sequenceNumber;
      if (last < this.highestSequenceSeen) {
        debug(
          `Media sequence went backwards (${last} < ${this.highestSequenceSeen}), waiting for new segments`
        );
      }
    }
    return segments.filter((s) => s.sequenceNumber > this.highestSequenceSeen);
  }

  _setState(state: RecorderState): void {
    this.state = state;
    this.emit("state", state);
  }

  _report(progress: IDownloadProgress): void {
    this.emit("progress", { ...progress });
  }

  _timer(ms: number, signal?: AbortSignal): Promise<void> {
    return sleep(ms, signal);
  }

  _now(): number {
    return Date.now();
  }
}
