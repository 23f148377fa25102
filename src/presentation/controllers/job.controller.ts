import { Request, Response } from "express";
import { CancelJobUseCase } from "../../application/use-cases/cancel-job.use-case";
import { DeleteJobUseCase } from "../../application/use-cases/delete-job.use-case";
import { GetArtifactUseCase } from "../../application/use-cases/get-artifact.use-case";
import { GetJobStatusUseCase } from "../../application/use-cases/get-job-status.use-case";
import { ListJobsUseCase } from "../../application/use-cases/list-jobs.use-case";
import { toJobStatusResponse, toJobSummaryResponse } from "../dto/job-status.dto";
import { sendError } from "../middleware/error.middleware";

export class JobController {
  constructor(
    private listJobsUseCase: ListJobsUseCase,
    private getJobStatusUseCase: GetJobStatusUseCase,
    private cancelJobUseCase: CancelJobUseCase,
    private deleteJobUseCase: DeleteJobUseCase,
    private getArtifactUseCase: GetArtifactUseCase
  ) {}

  async listJobs(req: Request, res: Response): Promise<void> {
    const rawLimit = req.query.limit;
    let limit: number | undefined;
    if (rawLimit !== undefined) {
      limit = typeof rawLimit === "string" ? parseInt(rawLimit, 10) : NaN;
      if (Number.isNaN(limit) || limit < 1) {
        res.status(400).json({ error: "limit must be a positive integer" });
        return;
      }
    }

    try {
      const jobs = await this.listJobsUseCase.execute(limit);
      res.status(200).json({ jobs: jobs.map(toJobSummaryResponse) });
    } catch (error) {
      sendError(res, error, "Failed to list jobs");
    }
  }

  async getJob(req: Request, res: Response): Promise<void> {
    try {
      const job = await this.getJobStatusUseCase.execute(req.params.jobId);
      res.status(200).json(toJobStatusResponse(job));
    } catch (error) {
      sendError(res, error, "Failed to get job");
    }
  }

  async cancelJob(req: Request, res: Response): Promise<void> {
    try {
      const job = await this.cancelJobUseCase.execute(req.params.jobId);
      res.status(200).json(toJobStatusResponse(job));
    } catch (error) {
      sendError(res, error, "Failed to cancel job");
    }
  }

  async deleteJob(req: Request, res: Response): Promise<void> {
    try {
      const result = await this.deleteJobUseCase.execute(req.params.jobId);
      res.status(200).json(result);
    } catch (error) {
      sendError(res, error, "Failed to delete job");
    }
  }

  async getArtifact(req: Request, res: Response): Promise<void> {
    try {
      const artifact = await this.getArtifactUseCase.execute(req.params.jobId, req.params.name);
      res.status(200).type(artifact.contentType).send(artifact.bytes);
    } catch (error) {
      sendError(res, error, "Failed to get artifact");
    }
  }
}
