import path from "path";
import { ArtifactNotFoundError, JobNotFoundError, ValidationError } from "../../domain/errors/job.errors";
import { IArtifactStorage } from "../../domain/interfaces/iartifact.storage";
import { IJobStore } from "../../domain/interfaces/ijob.store";

export interface Artifact {
  name: string;
  contentType: string;
  bytes: Buffer;
}

const ARTIFACT_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const CONTENT_TYPES: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".webp": "image/webp",
  ".srt": "application/x-subrip; charset=utf-8",
  ".json": "application/json; charset=utf-8",
};

export function contentTypeFor(name: string): string {
  return CONTENT_TYPES[path.extname(name).toLowerCase()] ?? "application/octet-stream";
}

export class GetArtifactUseCase {
  constructor(
    private jobStore: IJobStore,
    private storage: IArtifactStorage
  ) {}

  async execute(jobId: string, name: string): Promise<Artifact> {
    if (!ARTIFACT_NAME.test(name) || name.includes("..")) {
      throw new ValidationError(`Invalid artifact name: ${name}`);
    }
    const job = await this.jobStore.findById(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }

    const bytes = await this.storage.get(jobId, name);
    if (!bytes) {
      throw new ArtifactNotFoundError(jobId, name);
    }
    return { name, contentType: contentTypeFor(name), bytes };
  }
}
