import { VideoHandle, VideoMetadata } from "../entities/video-metadata";
import { VideoQuality } from "../enums/video-quality";

export interface VideoFetchOptions {
  signal?: AbortSignal;
  onProgress?: (percent: number) => void;
}

export interface VideoFetchResult {
  videoHandle: VideoHandle;
  metadata: VideoMetadata;
}

export interface IVideoSource {
  probe(url: string, options?: { signal?: AbortSignal }): Promise<VideoMetadata>;
  fetch(url: string, quality: VideoQuality, options?: VideoFetchOptions): Promise<VideoFetchResult>;
  /** Removes the downloaded media behind a handle. */
  release(videoHandle: VideoHandle): Promise<void>;
}
