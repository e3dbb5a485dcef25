import { spawn } from "child_process";
import { promises as fs } from "fs";
import path from "path";
import Debug from "debug";
import { MergeFailure, OperationCancelled } from "./errors";
const debug = Debug("hls-archiver:merger");

/**
 * Concatenates downloaded segment files, in the given order, into one
 * container at outputPath. Must reject on failure; the caller treats any
 * rejection as a failed job.
 */
export interface IMerger {
  merge(segmentFiles: string[], outputPath: string, signal?: AbortSignal): Promise<void>;
}

export interface IFFmpegMergerOptions {
  ffmpegPath?: string;
}

// Input for ffmpeg's concat demuxer, one `file '<path>'` per line
export function buildConcatList(segmentFiles: string[]): string {
  return segmentFiles.map((p) => `file '${p.replace(/'/g, "'\\''")}'`).join("\n") + "\n";
}

export async function removeQuietly(target: string): Promise<void> {
  try {
    await fs.rm(target, { recursive: true, force: true });
  } catch (err) {
    debug(`Failed to remove ${target}: ${err}`);
  }
}

export class FFmpegMerger implements IMerger {
  ffmpegPath: string;

  constructor(opts: IFFmpegMergerOptions = {}) {
    this.ffmpegPath = opts.ffmpegPath || "ffmpeg";
  }

  async merge(segmentFiles: string[], outputPath: string, signal?: AbortSignal): Promise<void> {
    if (segmentFiles.length === 0) {
      throw new MergeFailure("Nothing to merge: segment list is empty");
    }
    if (signal && signal.aborted) {
      throw new OperationCancelled();
    }
    const listPath = path.join(path.dirname(segmentFiles[0]), "segments.txt");
    await fs.writeFile(listPath, buildConcatList(segmentFiles), "utf8");
    debug(`Wrote concat list with ${segmentFiles.length} entries to ${listPath}`);

    try {
      await this._run(
        ["-f", "concat", "-safe", "0", "-i", listPath, "-c", "copy", "-y", outputPath, "-loglevel", "error"],
        signal
      );
    } catch (err) {
      await removeQuietly(outputPath);
      throw err;
    } finally {
      await removeQuietly(listPath);
    }
    debug(`Merged ${segmentFiles.length} segments into ${outputPath}`);
  }

  _run(args: string[], signal?: AbortSignal): Promise<void> {
    debug(`Executing ${this.ffmpegPath} ${args.join(" ")}`);
    return new Promise<void>((resolve, reject) => {
      const ffmpeg = spawn(this.ffmpegPath, args, { stdio: ["ignore", "ignore", "pipe"] });
      let stderr = "";
      let cancelled = false;

      const onAbort = () => {
        cancelled = true;
        debug(`Merge cancelled, killing ${this.ffmpegPath}`);
        ffmpeg.kill("SIGKILL");
      };
      if (signal) {
        signal.addEventListener("abort", onAbort, { once: true });
      }
      const detach = () => {
        if (signal) {
          signal.removeEventListener("abort", onAbort);
        }
      };

      if (ffmpeg.stderr) {
        ffmpeg.stderr.on("data", (data: Buffer) => {
          stderr += data.toString();
        });
      }
      ffmpeg.on("error", (err: NodeJS.ErrnoException) => {
        detach();
        const msg =
          err.code === "ENOENT"
            ? `FFmpeg executable '${this.ffmpegPath}' not found. Is it installed and on the PATH?`
            : `FFmpeg process error: ${err.message}`;
        debug(msg);
        reject(new MergeFailure(msg, null, err));
      });
      ffmpeg.on("close", (code: number | null) => {
        detach();
        if (cancelled) {
          reject(new OperationCancelled("Merge cancelled"));
        } else if (code === 0) {
          resolve();
        } else {
          debug(`FFmpeg failed with code ${code}: ${stderr.trim()}`);
          reject(new MergeFailure(`FFmpeg merging failed (exit code ${code}): ${stderr.trim()}`, code));
        }
      });
    });
  }
}
