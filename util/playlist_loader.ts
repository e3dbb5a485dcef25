import Debug from "debug";
import { FormatError, InvalidPlaylistError, OperationCancelled, isCancellation } from "./errors";
import { HttpFetcher, IFetcher, isTransient } from "./fetcher";
import { parseM3U8 } from "./m3u8_parser";
import {
  Playlist,
  QualityPreference,
  qualityDisplayName,
  selectQuality,
} from "./playlist_model";
import { sleep } from "./segment_downloader";
import { IDownloadSettings, resolveSettings } from "./settings";
const debug = Debug("hls-archiver:loader");

/**
 * Fetches playlists and turns them into Playlist records. The final URL after
 * redirects becomes the playlist's base, so relative references inside it
 * resolve against where the text actually came from.
 */
export class PlaylistLoader {
  settings: IDownloadSettings;
  fetcher: IFetcher;

  constructor(settings: Partial<IDownloadSettings> = {}, fetcher?: IFetcher) {
    this.settings = resolveSettings(settings);
    this.fetcher = fetcher || new HttpFetcher(this.settings);
  }

  async loadPlaylist(url: string, signal?: AbortSignal): Promise<Playlist> {
    const maxRetries = this.settings.maxRetries;
    for (let attempt = 0; ; attempt++) {
      if (signal && signal.aborted) {
        throw new OperationCancelled();
      }
      if (attempt > 0) {
        debug(`Retrying playlist ${url} (attempt ${attempt + 1}/${maxRetries + 1})`);
        await this._timer(this.settings.retryBaseDelayMs * attempt, signal);
      }
      try {
        const fetched = await this.fetcher.fetchText(url, signal);
        if (fetched.url !== url) {
          debug(`Playlist ${url} redirected to ${fetched.url}`);
        }
        return parseM3U8(fetched.text, fetched.url);
      } catch (err) {
        if (isTransient(err) && attempt < maxRetries) {
          debug(`Transient error fetching playlist ${url}: ${err}`);
          continue;
        }
        throw err;
      }
    }
  }

  /**
   * Returns a media playlist: a master playlist is narrowed to one variant
   * according to the preference and that variant's playlist is loaded.
   */
  async resolveMediaPlaylist(
    playlist: Playlist,
    preference: QualityPreference = "highest",
    signal?: AbortSignal
  ): Promise<Playlist> {
    if (!playlist.isMaster) {
      return playlist;
    }
    const variant = selectQuality(playlist, preference);
    if (!variant) {
      throw new InvalidPlaylistError("Master playlist contains no quality variants");
    }
    debug(`Selected quality variant: ${qualityDisplayName(variant)} -> ${variant.url}`);
    const media = await this.loadPlaylist(variant.url, signal);
    if (media.isMaster) {
      throw new InvalidPlaylistError(`Variant ${variant.url} is itself a master playlist`);
    }
    return media;
  }

  /**
   * Loads every candidate URL produced by page scraping. Candidates that
   * cannot be fetched or parsed are logged and left out.
   */
  async analyze(candidateUrls: string[], signal?: AbortSignal): Promise<Playlist[]> {
    const unique = Array.from(new Set(candidateUrls.map((u) => u.trim()).filter((u) => u !== "")));
    debug(`Analyzing ${unique.length} candidate playlist URLs`);
    const playlists: Playlist[] = [];
    for (const url of unique) {
      try {
        playlists.push(await this.loadPlaylist(url, signal));
      } catch (err) {
        if (isCancellation(err)) {
          throw err;
        }
        if (err instanceof FormatError) {
          debug(`Skipping ${url}: not an M3U8 playlist`);
        } else {
          debug(`Skipping ${url}: ${err}`);
        }
      }
    }
    return playlists;
  }

  _timer(ms: number, signal?: AbortSignal): Promise<void> {
    return sleep(ms, signal);
  }
}
