export type QualityVariant = {
  readonly bandwidth: number; // bits per second
  readonly resolution?: string; // "WxH"
  readonly codecs?: string;
  readonly url: string;
};

export type Segment = {
  readonly url: string;
  readonly duration: number; // seconds
  readonly sequenceNumber: number;
  readonly encryptionKeyUrl?: string;
  readonly encryptionIV?: string; // hex digits as written, 0x prefix stripped
};

export interface Playlist {
  readonly isMaster: boolean;
  readonly isLive: boolean;
  readonly targetDuration: number;
  readonly baseUrl: string;
  readonly qualities: readonly QualityVariant[];
  readonly segments: readonly Segment[];
  // key URL -> key bytes; an empty string until someone fetches the key
  readonly encryptionKeys: Readonly<Record<string, string>>;
}

export enum DownloadPhase {
  INITIALIZING = "Initializing",
  DOWNLOADING = "Downloading",
  MERGING = "Merging",
  COMPLETED = "Completed",
  CANCELLED = "Cancelled",
  FAILED = "Failed",
}

export const TERMINAL_PHASES: readonly DownloadPhase[] = [
  DownloadPhase.COMPLETED,
  DownloadPhase.CANCELLED,
  DownloadPhase.FAILED,
];

export interface IDownloadProgress {
  totalSegments: number;
  downloadedSegments: number;
  phase: DownloadPhase;
}

export function progressPercentage(progress: IDownloadProgress): number {
  if (progress.totalSegments <= 0) {
    return 0;
  }
  return (progress.downloadedSegments / progress.totalSegments) * 100;
}

export type QualityPreference = "highest" | "lowest" | number;

/**
 * Picks a variant from a master playlist. A numeric preference selects the
 * best variant whose bandwidth does not exceed it, or the lowest one when all
 * variants are above it. The playlist itself is left in source order.
 */
export function selectQuality(
  playlist: Playlist,
  preference: QualityPreference = "highest"
): QualityVariant | undefined {
  const sorted = [...playlist.qualities].sort((a, b) => a.bandwidth - b.bandwidth);
  if (sorted.length === 0) {
    return undefined;
  }
  if (preference === "highest") {
    return sorted[sorted.length - 1];
  }
  if (preference === "lowest") {
    return sorted[0];
  }
  const fitting = sorted.filter((q) => q.bandwidth <= preference);
  return fitting.length > 0 ? fitting[fitting.length - 1] : sorted[0];
}

const AUDIO_CODECS = /mp4a|aac/i;
const VIDEO_CODECS = /avc|hvc/i;

// e.g. "1080p (5.2 Mbps)", "480p (800 kbps)", "128 kbps"
export function qualityDisplayName(variant: QualityVariant): string {
  let name = "";
  let hasInfo = false;

  if (variant.resolution) {
    const parts = variant.resolution.split("x");
    const height = parts.length === 2 ? parseInt(parts[1], 10) : NaN;
    name += isNaN(height) ? variant.resolution : `${height}p`;
    hasInfo = true;
  }

  if (variant.bandwidth > 0) {
    const rate =
      variant.bandwidth >= 1_000_000
        ? `${(variant.bandwidth / 1_000_000).toFixed(1)} Mbps`
        : `${Math.floor(variant.bandwidth / 1000)} kbps`;
    name += hasInfo ? ` (${rate})` : rate;
    hasInfo = true;
  }

  if (hasInfo) {
    return name;
  }
  const codecs = variant.codecs || "";
  if (AUDIO_CODECS.test(codecs) && !VIDEO_CODECS.test(codecs)) {
    return "Audio";
  }
  return `Variant ${variant.bandwidth}`;
}
