import { Job } from "../../domain/entities/job";
import { IJobStore } from "../../domain/interfaces/ijob.store";

const MAX_LIMIT = 200;

export class ListJobsUseCase {
  constructor(private jobStore: IJobStore) {}

  async execute(limit = 50): Promise<Job[]> {
    return this.jobStore.findRecent(Math.min(Math.max(limit, 1), MAX_LIMIT));
  }
}
