import { isTerminalStatus } from "../../domain/enums/job-status";
import { JobNotFoundError } from "../../domain/errors/job.errors";
import { IArtifactStorage } from "../../domain/interfaces/iartifact.storage";
import { IJobStore } from "../../domain/interfaces/ijob.store";

export interface DeleteJobResult {
  jobId: string;
  artifactsDeleted: number;
}

export class DeleteJobUseCase {
  constructor(
    private jobStore: IJobStore,
    private storage: IArtifactStorage
  ) {}

  async execute(jobId: string): Promise<DeleteJobResult> {
    const job = await this.jobStore.findById(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }

    if (!isTerminalStatus(job.status)) {
      // The pipeline treats a vanished job as cancelled
      await this.jobStore.requestCancellation(jobId);
    }

    const artifactsDeleted = await this.storage.deleteJob(jobId);
    await this.jobStore.delete(jobId);
    console.log(`[DeleteJob] Deleted job ${jobId} and ${artifactsDeleted} artifact(s)`);

    return { jobId, artifactsDeleted };
  }
}
