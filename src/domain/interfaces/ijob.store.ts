import { Job, JobProgressEvent, JobRequest } from "../entities/job";

export type JobPatch = Partial<
  Pick<Job, "status" | "error" | "errorCause" | "result" | "startedAt" | "completedAt">
>;

export interface IJobStore {
  create(request: JobRequest): Promise<Job>;
  findById(id: string): Promise<Job | null>;
  findRecent(limit?: number): Promise<Job[]>;
  /**
   * Appends a history entry and moves progress forward (never backwards).
   * Ignored once the job is terminal.
   */
  recordProgress(id: string, event: JobProgressEvent): Promise<Job | null>;
  update(id: string, patch: JobPatch): Promise<Job | null>;
  requestCancellation(id: string): Promise<Job | null>;
  /**
   * Moves a job that is still queued straight to cancelled, in one write.
   * Returns null when the job is missing or has already left the queue.
   */
  cancelIfQueued(id: string, message: string): Promise<Job | null>;
  delete(id: string): Promise<boolean>;
  findTerminalBefore(date: Date, limit?: number): Promise<Job[]>;
}
