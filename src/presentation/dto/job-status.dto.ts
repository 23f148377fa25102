import { Job, JobHistoryEntry } from "../../domain/entities/job";
import { JobStatus } from "../../domain/enums/job-status";
import { HistoryStep } from "../../domain/enums/pipeline-step";
import { PipelineResult } from "../../domain/entities/pipeline-result";

export interface JobStatusResponse {
  jobId: string;
  url: string;
  status: JobStatus;
  progress: number; // 0-100
  message: string;
  currentStep: HistoryStep;
  history: JobHistoryEntry[];
  cancelRequested: boolean;
  error?: string;
  errorCause?: string;
  result?: PipelineResult;
  createdAt: Date;
  updatedAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

export interface JobSummaryResponse {
  jobId: string;
  url: string;
  status: JobStatus;
  progress: number;
  message: string;
  createdAt: Date;
}

// Credentials submitted with the request are never echoed back
export function toJobStatusResponse(job: Job): JobStatusResponse {
  return {
    jobId: job.id,
    url: job.request.url,
    status: job.status,
    progress: job.progress,
    message: job.message,
    currentStep: job.currentStep,
    history: job.history,
    cancelRequested: job.cancelRequested,
    error: job.error,
    errorCause: job.errorCause,
    result: job.result,
    createdAt: job.createdAt,
    updatedAt: job.updatedAt,
    startedAt: job.startedAt,
    completedAt: job.completedAt,
  };
}

export function toJobSummaryResponse(job: Job): JobSummaryResponse {
  return {
    jobId: job.id,
    url: job.request.url,
    status: job.status,
    progress: job.progress,
    message: job.message,
    createdAt: job.createdAt,
  };
}
