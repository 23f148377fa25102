import { VideoHandle } from "../../domain/entities/video-metadata";
import { FrameExtractOptions, IFrameCapture } from "../../domain/interfaces/iframe.capture";
import { runProcess } from "./process.runner";

export interface FfmpegFrameCaptureConfig {
  ffmpegPath: string;
  maxWidth?: number; // Default: 1280
}

/**
 * Cuts JPEG stills with ffmpeg, piping images through stdout/stdin so no
 * temporary files are needed.
 */
export class FfmpegFrameCapture implements IFrameCapture {
  readonly extension = "jpg";
  readonly contentType = "image/jpeg";
  private maxWidth: number;

  constructor(private readonly config: FfmpegFrameCaptureConfig) {
    this.maxWidth = config.maxWidth ?? 1280;
  }

  async extract(videoHandle: VideoHandle, timestamp: number, options: FrameExtractOptions = {}): Promise<Buffer> {
    // -ss before -i seeks on keyframes first, then decodes to the exact time
    const args = ["-hide_banner", "-loglevel", "error", "-ss", timestamp.toFixed(3), "-i", videoHandle.filePath, "-frames:v", "1"];
    if (options.height) {
      args.push("-vf", `scale=-2:${options.height}`);
    }
    args.push("-q:v", "2", "-f", "image2pipe", "-vcodec", "mjpeg", "pipe:1");

    const { stdout } = await runProcess(this.config.ffmpegPath, args, { signal: options.signal });
    if (stdout.length === 0) {
      throw new Error(`ffmpeg produced no image at ${timestamp.toFixed(3)}s`);
    }
    return stdout;
  }

  async optimize(image: Buffer, options: { signal?: AbortSignal } = {}): Promise<Buffer> {
    const { stdout } = await runProcess(
      this.config.ffmpegPath,
      [
        "-hide_banner",
        "-loglevel",
        "error",
        "-f",
        "image2pipe",
        "-i",
        "pipe:0",
        "-vf",
        `scale='min(${this.maxWidth},iw)':-2`,
        // mjpeg qscale 5 is roughly JPEG quality 85
        "-q:v",
        "5",
        "-f",
        "image2pipe",
        "-vcodec",
        "mjpeg",
        "pipe:1",
      ],
      { signal: options.signal, input: image }
    );
    return stdout;
  }
}
