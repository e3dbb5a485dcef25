import { EventEmitter } from "events";
import Debug from "debug";
import { isCancellation } from "./util/errors";
import { IRecordingResult, LiveStreamRecorder } from "./util/live_recorder";
import { PlaylistLoader } from "./util/playlist_loader";
import { Playlist, QualityPreference } from "./util/playlist_model";
import {
  IDownloadResult,
  IEngineDependencies,
  SegmentDownloadOrchestrator,
} from "./util/segment_downloader";
import { IDownloadSettings, resolveSettings } from "./util/settings";
const debug = Debug("hls-archiver:archiver");

export * from "./util/errors";
export * from "./util/fetcher";
export * from "./util/gate";
export * from "./util/live_recorder";
export * from "./util/m3u8_parser";
export * from "./util/merger";
export * from "./util/playlist_loader";
export * from "./util/playlist_model";
export * from "./util/segment_downloader";
export * from "./util/settings";
export * from "./util/url_resolver";

export interface IArchiveOptions {
  outputFileName?: string;
  quality?: QualityPreference; // variant to pick when the URL is a master playlist
  maxDurationSeconds?: number; // live only, 0 for no limit
  pollIntervalMs?: number; // live only
  signal?: AbortSignal;
}

export type ArchiveResult =
  | ({ kind: "vod" } & IDownloadResult)
  | ({ kind: "live" } & IRecordingResult);

/**
 * Takes a playlist URL all the way to a local file: loads it, narrows a
 * master playlist down to one variant, then either downloads the VOD or
 * records the live stream.
 *
 * Re-emits "progress" from whichever engine runs, "segments" from live
 * recordings, and "error" for failures other than cancellation when someone
 * listens for it.
 */
export class HLSArchiver extends EventEmitter {
  settings: IDownloadSettings;
  loader: PlaylistLoader;
  orchestrator: SegmentDownloadOrchestrator;
  recorder: LiveStreamRecorder;

  constructor(settings: Partial<IDownloadSettings> = {}, deps: IEngineDependencies = {}) {
    super();
    this.settings = resolveSettings(settings);
    this.recorder = new LiveStreamRecorder(this.settings, deps);
    this.orchestrator = this.recorder.orchestrator;
    this.loader = this.recorder.loader;

    this.orchestrator.on("progress", (progress) => this.emit("progress", progress));
    this.recorder.on("progress", (progress) => this.emit("progress", progress));
    this.recorder.on("segments", (segments) => this.emit("segments", segments));
    debug(`Archiver settings: ${JSON.stringify({ ...this.settings, userAgent: undefined })}`);
  }

  analyze(candidateUrls: string[], signal?: AbortSignal): Promise<Playlist[]> {
    return this.loader.analyze(candidateUrls, signal);
  }

  async archive(url: string, destinationDir: string, opts: IArchiveOptions = {}): Promise<ArchiveResult> {
    try {
      const playlist = await this.loader.loadPlaylist(url, opts.signal);
      const media = await this.loader.resolveMediaPlaylist(playlist, opts.quality, opts.signal);

      if (media.isLive) {
        debug(`${media.baseUrl} is live, recording`);
        const recording = await this.recorder.record(media, destinationDir, {
          maxDurationSeconds: opts.maxDurationSeconds,
          pollIntervalMs: opts.pollIntervalMs,
          outputFileName: opts.outputFileName,
          signal: opts.signal,
        });
        return { kind: "live", ...recording };
      }

      debug(`${media.baseUrl} is a VOD with ${media.segments.length} segments, downloading`);
      const download = await this.orchestrator.download(media, destinationDir, {
        outputFileName: opts.outputFileName,
        signal: opts.signal,
      });
      return { kind: "vod", ...download };
    } catch (err) {
      if (!isCancellation(err) && this.listenerCount("error") > 0) {
        this.emit("error", err);
      }
      throw err;
    }
  }

  // Gracefully ends a live recording started by archive()
  stop(): void {
    this.recorder.stop();
  }
}
