import { randomUUID } from "crypto";
import { Job, JobProgressEvent, JobRequest } from "../../domain/entities/job";
import { isTerminalStatus } from "../../domain/enums/job-status";
import { IJobStore, JobPatch } from "../../domain/interfaces/ijob.store";
import { capHistory, createQueuedJob, DEFAULT_HISTORY_LIMIT, historyEntry, nextProgress } from "../../domain/utils/job-state";

/**
 * Process-local job store. Every read returns a deep copy, so callers never
 * hold a reference the owning worker is still mutating.
 */
export class InMemoryJobStore implements IJobStore {
  private jobs = new Map<string, Job>();

  constructor(private readonly historyLimit: number = DEFAULT_HISTORY_LIMIT) {}

  async create(request: JobRequest): Promise<Job> {
    const job = createQueuedJob(randomUUID(), request);
    this.jobs.set(job.id, job);
    return structuredClone(job);
  }

  async findById(id: string): Promise<Job | null> {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : null;
  }

  async findRecent(limit: number = 50): Promise<Job[]> {
    return [...this.jobs.values()]
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map((job) => structuredClone(job));
  }

  async recordProgress(id: string, event: JobProgressEvent): Promise<Job | null> {
    const job = this.jobs.get(id);
    if (!job) {
      return null;
    }
    if (isTerminalStatus(job.status)) {
      return structuredClone(job);
    }

    const now = new Date();
    const status = event.status ?? job.status;
    const progress = nextProgress(job.progress, event.progress);
    const updated: Job = {
      ...job,
      ...event.patch,
      status,
      currentStep: event.step,
      progress,
      message: event.message,
      history: capHistory([...job.history, historyEntry(event, status, progress, now)], this.historyLimit),
      updatedAt: now,
    };
    this.jobs.set(id, updated);
    return structuredClone(updated);
  }

  async update(id: string, patch: JobPatch): Promise<Job | null> {
    const job = this.jobs.get(id);
    if (!job) {
      return null;
    }
    if (isTerminalStatus(job.status)) {
      return structuredClone(job);
    }
    const updated: Job = { ...job, ...patch, updatedAt: new Date() };
    this.jobs.set(id, updated);
    return structuredClone(updated);
  }

  async requestCancellation(id: string): Promise<Job | null> {
    const job = this.jobs.get(id);
    if (!job) {
      return null;
    }
    if (!isTerminalStatus(job.status)) {
      this.jobs.set(id, { ...job, cancelRequested: true, updatedAt: new Date() });
    }
    return this.findById(id);
  }

  async cancelIfQueued(id: string, message: string): Promise<Job | null> {
    const job = this.jobs.get(id);
    if (!job || job.status !== "queued") {
      return null;
    }
    const now = new Date();
    const event: JobProgressEvent = { step: "cancelled", progress: job.progress, message };
    const updated: Job = {
      ...job,
      status: "cancelled",
      currentStep: event.step,
      message,
      history: capHistory([...job.history, historyEntry(event, "cancelled", job.progress, now)], this.historyLimit),
      completedAt: now,
      updatedAt: now,
    };
    this.jobs.set(id, updated);
    return structuredClone(updated);
  }

  async delete(id: string): Promise<boolean> {
    return this.jobs.delete(id);
  }

  async findTerminalBefore(date: Date, limit: number = 100): Promise<Job[]> {
    return [...this.jobs.values()]
      .filter((job) => isTerminalStatus(job.status) && job.updatedAt.getTime() < date.getTime())
      .slice(0, limit)
      .map((job) => structuredClone(job));
  }
}
