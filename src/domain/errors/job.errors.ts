export class JobNotFoundError extends Error {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} not found`);
    this.name = "JobNotFoundError";
  }
}

export class ArtifactNotFoundError extends Error {
  constructor(readonly jobId: string, readonly artifactName: string) {
    super(`Artifact ${artifactName} not found for job ${jobId}`);
    this.name = "ArtifactNotFoundError";
  }
}

export class JobStateConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JobStateConflictError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}
