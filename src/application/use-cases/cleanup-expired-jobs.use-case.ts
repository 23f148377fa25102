import { errorMessage } from "../../domain/errors/pipeline.errors";
import { IArtifactStorage } from "../../domain/interfaces/iartifact.storage";
import { IJobStore } from "../../domain/interfaces/ijob.store";

export interface CleanupExpiredJobsResult {
  jobsDeleted: number;
  artifactsDeleted: number;
  failures: string[]; // job ids that could not be removed
}

/**
 * Removes finished jobs (and their stored artifacts) once they are older than
 * the retention window.
 */
export class CleanupExpiredJobsUseCase {
  constructor(
    private jobStore: IJobStore,
    private storage: IArtifactStorage,
    private retentionHours: number,
    private batchSize = 100
  ) {}

  async execute(now: Date = new Date()): Promise<CleanupExpiredJobsResult> {
    const cutoff = new Date(now.getTime() - this.retentionHours * 60 * 60 * 1000);
    const expired = await this.jobStore.findTerminalBefore(cutoff, this.batchSize);

    const result: CleanupExpiredJobsResult = { jobsDeleted: 0, artifactsDeleted: 0, failures: [] };

    for (const job of expired) {
      try {
        result.artifactsDeleted += await this.storage.deleteJob(job.id);
        if (await this.jobStore.delete(job.id)) {
          result.jobsDeleted++;
        }
      } catch (error) {
        console.error(`[CleanupExpiredJobs] Failed to remove job ${job.id}: ${errorMessage(error)}`);
        result.failures.push(job.id);
      }
    }

    return result;
  }
}
