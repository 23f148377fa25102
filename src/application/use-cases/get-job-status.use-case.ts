import { Job } from "../../domain/entities/job";
import { JobNotFoundError } from "../../domain/errors/job.errors";
import { IJobStore } from "../../domain/interfaces/ijob.store";

export class GetJobStatusUseCase {
  constructor(private jobStore: IJobStore) {}

  async execute(jobId: string): Promise<Job> {
    const job = await this.jobStore.findById(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }
}
