import { VideoHandle } from "../entities/video-metadata";

export interface TranscriptionSegment {
  startSec: number;
  endSec: number;
  text: string;
}

export interface TranscriptionResult {
  language: string;
  segments: TranscriptionSegment[];
}

export interface TranscriptionOptions {
  apiKey?: string;
  language?: string; // auto-detect when absent
  signal?: AbortSignal;
}

export interface ITranscriptionProvider {
  transcribe(videoHandle: VideoHandle, options?: TranscriptionOptions): Promise<TranscriptionResult>;
}
