import { Job } from "../../domain/entities/job";
import { isTerminalStatus } from "../../domain/enums/job-status";
import { JobNotFoundError, JobStateConflictError } from "../../domain/errors/job.errors";
import { IJobStore } from "../../domain/interfaces/ijob.store";

export class CancelJobUseCase {
  constructor(private jobStore: IJobStore) {}

  /**
   * A running job stops at its next step boundary. A job that never started
   * is cancelled right away, so it is skipped when its turn comes.
   */
  async execute(jobId: string): Promise<Job> {
    const job = await this.jobStore.findById(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    if (isTerminalStatus(job.status)) {
      throw new JobStateConflictError(`Job ${jobId} is already ${job.status}`);
    }

    const requested = await this.jobStore.requestCancellation(jobId);
    if (!requested) {
      throw new JobNotFoundError(jobId);
    }

    // The runner may have picked the job up since it was read; the store decides
    const cancelled = await this.jobStore.cancelIfQueued(jobId, "Cancelled before start");
    if (cancelled) {
      console.log(`[CancelJob] Job ${jobId} cancelled while queued`);
      return cancelled;
    }

    console.log(`[CancelJob] Cancellation requested for job ${jobId}`);
    return requested;
  }
}
