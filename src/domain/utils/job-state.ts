import { Job, JobHistoryEntry, JobProgressEvent, JobRequest } from "../entities/job";
import { JobStatus } from "../enums/job-status";

export const DEFAULT_HISTORY_LIMIT = 200;

export function createQueuedJob(id: string, request: JobRequest, now: Date = new Date()): Job {
  return {
    id,
    status: "queued",
    currentStep: "queued",
    progress: 0,
    message: "Waiting to start",
    history: [{ timestamp: now.toISOString(), status: "queued", step: "queued", progress: 0, message: "Waiting to start" }],
    request,
    cancelRequested: false,
    createdAt: now,
    updatedAt: now,
  };
}

/** Progress never moves backwards and stays within 0-100. */
export function nextProgress(current: number, requested: number): number {
  const clamped = Math.min(Math.max(Math.round(requested), 0), 100);
  return Math.max(current, clamped);
}

export function historyEntry(
  event: JobProgressEvent,
  status: JobStatus,
  progress: number,
  now: Date = new Date()
): JobHistoryEntry {
  return { timestamp: now.toISOString(), status, step: event.step, progress, message: event.message };
}

/** Keeps the most recent entries. */
export function capHistory(history: JobHistoryEntry[], limit: number): JobHistoryEntry[] {
  return history.length <= limit ? history : history.slice(history.length - limit);
}
