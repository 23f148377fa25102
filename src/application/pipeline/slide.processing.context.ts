import { CapturedFrame, FrameSpec } from "../../domain/entities/frame-spec";
import { JobRequest } from "../../domain/entities/job";
import { PipelineResult, PipelineWarning, ReconciliationEvent } from "../../domain/entities/pipeline-result";
import { SubtitleCue } from "../../domain/entities/subtitle-cue";
import { VideoHandle, VideoMetadata } from "../../domain/entities/video-metadata";
import { TranslationEngine } from "../../domain/enums/translation-engine";
import { SubtitleTrack } from "../../domain/interfaces/isubtitle.source";

export interface SlideProcessingContext {
  jobId: string;
  request: JobRequest;
  startedAtMs: number;
  translationEngine?: TranslationEngine; // resolved in prepare
  metadata?: VideoMetadata;
  videoHandle?: VideoHandle;
  subtitleTrack?: SubtitleTrack; // SRT text is rewritten in place by optimize
  cues?: SubtitleCue[];
  subtitleArtifact?: string;
  frameSpecs?: FrameSpec[];
  frames?: CapturedFrame[];
  translatedTo?: string;
  translatedSubtitleArtifact?: string;
  outline?: string;
  outlineProvider?: string;
  reconciliationEvents: ReconciliationEvent[];
  warnings: PipelineWarning[];
  result?: PipelineResult;
}

export function createContext(jobId: string, request: JobRequest): SlideProcessingContext {
  return {
    jobId,
    request,
    startedAtMs: Date.now(),
    reconciliationEvents: [],
    warnings: [],
  };
}
