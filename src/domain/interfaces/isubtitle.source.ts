import { VideoHandle, VideoMetadata } from "../entities/video-metadata";

export interface SubtitleTrack {
  rawText: string; // SRT
  language: string;
  isAutoGenerated: boolean;
}

export interface ISubtitleSource {
  /**
   * Resolves null when the platform has no track for the preferred languages.
   */
  fetch(
    videoHandle: VideoHandle,
    metadata: VideoMetadata,
    languagePreference?: string[],
    options?: { signal?: AbortSignal }
  ): Promise<SubtitleTrack | null>;
}
