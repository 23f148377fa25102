export interface VideoMetadata {
  id: string;
  title: string;
  durationSec?: number;
  channel?: string;
  description?: string;
  thumbnail?: string;
  availableSubtitles: string[]; // manual, uploaded by the creator
  automaticCaptions: string[];
}

export interface VideoHandle {
  videoId: string;
  sourceUrl: string;
  filePath: string;
}
