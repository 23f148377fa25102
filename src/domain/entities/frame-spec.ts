export interface FrameSpec {
  index: number; // 1-based, drives frame_%04d naming
  timestamp: number; // seconds, within [0, videoDuration]
  cueIndex: number; // SubtitleCue.index the timestamp was derived from
}

export interface CapturedFrame extends FrameSpec {
  artifactName: string;
  sizeBytes: number;
  subtitle: string;
  translatedSubtitle?: string;
}
