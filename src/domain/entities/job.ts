import { AiProvider } from "../enums/ai-provider";
import { JobStatus } from "../enums/job-status";
import { HistoryStep, PipelineStep } from "../enums/pipeline-step";
import { ScreenshotPosition } from "../enums/screenshot-position";
import { TranslationEngine } from "../enums/translation-engine";
import { VideoQuality } from "../enums/video-quality";
import { PipelineResult } from "./pipeline-result";

export interface JobRequest {
  url: string;
  quality: VideoQuality;
  subtitleLanguagePreference?: string[]; // auto-detect when absent
  translateTo?: string | null;
  translationEngine?: TranslationEngine;
  screenshotPosition: ScreenshotPosition;
  screenshotOffset: number; // seconds, signed
  generateOutline: boolean;
  aiProvider?: AiProvider;
  aiModel?: string;
  apiKey?: string;
  useAiTranscription: boolean;
  transcriptionApiKey?: string;
}

export interface JobHistoryEntry {
  timestamp: string; // ISO-8601
  status: JobStatus;
  step: HistoryStep;
  progress: number;
  message: string;
}

export interface Job {
  id: string;
  status: JobStatus;
  currentStep: HistoryStep;
  progress: number; // 0-100, non-decreasing while running
  message: string;
  history: JobHistoryEntry[];
  request: JobRequest;
  cancelRequested: boolean;
  error?: string;
  errorCause?: string;
  result?: PipelineResult;
  createdAt: Date;
  updatedAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

export interface JobProgressEvent {
  step: HistoryStep;
  progress: number;
  message: string;
  status?: JobStatus;
  // Applied in the same write as the history entry
  patch?: Partial<Pick<Job, "error" | "errorCause" | "result" | "startedAt" | "completedAt">>;
}

export type RunnableStep = Exclude<PipelineStep, "queued" | "complete">;
