import { CapturedFrame } from "./frame-spec";
import { SubtitleCue } from "./subtitle-cue";

export interface ReconciliationEvent {
  kind: "backfill" | "passthrough";
  batchIndex: number;
  cueIndex: number; // position within the full cue list, 0-based
  reason: string;
}

export interface PipelineWarning {
  step: string;
  message: string;
}

export interface PipelineResult {
  videoId: string;
  title: string;
  subtitleLanguage: string;
  subtitleArtifact: string;
  translatedSubtitleArtifact?: string;
  translatedTo?: string;
  cues: SubtitleCue[];
  frames: CapturedFrame[];
  outline?: string;
  outlineProvider?: string;
  reconciliationEvents: ReconciliationEvent[];
  warnings: PipelineWarning[];
  processingTimeSec: number;
}
