import { randomUUID } from "crypto";
import { mkdir, readdir, rm } from "fs/promises";
import path from "path";
import { VideoHandle, VideoMetadata } from "../../domain/entities/video-metadata";
import { VideoQuality } from "../../domain/enums/video-quality";
import { IVideoSource, VideoFetchOptions, VideoFetchResult } from "../../domain/interfaces/ivideo.source";
import { runProcess } from "./process.runner";

export interface YtDlpVideoSourceConfig {
  ytDlpPath: string;
  workDir: string;
}

const PROGRESS_LINE = /\[download\]\s+(\d+(?:\.\d+)?)%/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/** Maps yt-dlp's --dump-json output onto VideoMetadata. */
export function parseVideoInfo(raw: unknown): VideoMetadata {
  if (!isRecord(raw)) {
    throw new Error("yt-dlp returned malformed video information");
  }
  const id = optionalString(raw.id) ?? optionalString(raw.display_id);
  if (!id) {
    throw new Error("yt-dlp returned no video id");
  }
  const duration = typeof raw.duration === "number" && Number.isFinite(raw.duration) ? raw.duration : undefined;

  return {
    id,
    title: optionalString(raw.title) ?? optionalString(raw.fulltitle) ?? id,
    durationSec: duration,
    channel: optionalString(raw.channel) ?? optionalString(raw.uploader),
    description: optionalString(raw.description),
    thumbnail: optionalString(raw.thumbnail),
    availableSubtitles: isRecord(raw.subtitles) ? Object.keys(raw.subtitles).filter((code) => code !== "live_chat") : [],
    automaticCaptions: isRecord(raw.automatic_captions) ? Object.keys(raw.automatic_captions) : [],
  };
}

export function formatSelector(quality: VideoQuality): string {
  return [
    `bestvideo[height<=${quality}][ext=mp4]+bestaudio[ext=m4a]`,
    `best[height<=${quality}][ext=mp4]`,
    `best[height<=${quality}]`,
    "best",
  ].join("/");
}

export class YtDlpVideoSource implements IVideoSource {
  constructor(private readonly config: YtDlpVideoSourceConfig) {}

  async probe(url: string, options: { signal?: AbortSignal } = {}): Promise<VideoMetadata> {
    const { stdout } = await runProcess(
      this.config.ytDlpPath,
      ["--no-playlist", "--dump-json", "--skip-download", "--no-warnings", url],
      { signal: options.signal }
    );
    return parseVideoInfo(JSON.parse(stdout.toString("utf-8")));
  }

  async fetch(url: string, quality: VideoQuality, options: VideoFetchOptions = {}): Promise<VideoFetchResult> {
    const metadata = await this.probe(url, { signal: options.signal });
    const jobDir = path.resolve(this.config.workDir, randomUUID());
    await mkdir(jobDir, { recursive: true });

    try {
      console.log(`[YtDlpVideoSource] Downloading ${metadata.id} at <=${quality}p`);
      let lastProgress = 0;
      await runProcess(
        this.config.ytDlpPath,
        [
          "--no-playlist",
          "--format",
          formatSelector(quality),
          "--merge-output-format",
          "mp4",
          "--output",
          path.join(jobDir, "video.%(ext)s"),
          "--newline",
          "--no-warnings",
          url,
        ],
        {
          signal: options.signal,
          onOutputLine: (line) => {
            const match = PROGRESS_LINE.exec(line);
            if (!match) return;
            const progress = parseFloat(match[1]);
            if (!Number.isNaN(progress) && progress > lastProgress) {
              lastProgress = progress;
              options.onProgress?.(progress);
            }
          },
        }
      );

      const files = (await readdir(jobDir)).filter((name) => name.startsWith("video."));
      if (files.length === 0) {
        throw new Error("Video download failed: no file was downloaded");
      }
      if (lastProgress < 100) {
        options.onProgress?.(100);
      }

      const videoHandle: VideoHandle = { videoId: metadata.id, sourceUrl: url, filePath: path.join(jobDir, files[0]) };
      return { videoHandle, metadata };
    } catch (error) {
      await rm(jobDir, { recursive: true, force: true });
      throw error;
    }
  }

  async release(videoHandle: VideoHandle): Promise<void> {
    await rm(path.dirname(videoHandle.filePath), { recursive: true, force: true });
  }
}
