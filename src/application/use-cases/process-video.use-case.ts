import { Job, JobRequest } from "../../domain/entities/job";
import { IJobStore } from "../../domain/interfaces/ijob.store";
import { JobRunner } from "../services/job.runner";

export class ProcessVideoUseCase {
  constructor(
    private jobStore: IJobStore,
    private jobRunner: JobRunner
  ) {}

  /** Creates the job and schedules it; processing continues in the background. */
  async execute(request: JobRequest): Promise<Job> {
    const job = await this.jobStore.create(request);
    console.log(`[ProcessVideo] Created job ${job.id} for ${request.url}`);
    this.jobRunner.enqueue(job.id);
    return job;
  }
}
