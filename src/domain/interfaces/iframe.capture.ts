import { VideoHandle } from "../entities/video-metadata";

export interface FrameExtractOptions {
  height?: number;
  signal?: AbortSignal;
}

export interface IFrameCapture {
  readonly extension: string; // "jpg"
  readonly contentType: string;
  extract(videoHandle: VideoHandle, timestamp: number, options?: FrameExtractOptions): Promise<Buffer>;
  optimize(image: Buffer, options?: { signal?: AbortSignal }): Promise<Buffer>;
}
