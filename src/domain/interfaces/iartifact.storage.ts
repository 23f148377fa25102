export interface IArtifactStorage {
  /** Stores bytes and returns a reference (path or URI) to the artifact. */
  put(jobId: string, artifactName: string, bytes: Buffer, contentType?: string): Promise<string>;
  get(jobId: string, artifactName: string): Promise<Buffer | null>;
  list(jobId: string): Promise<string[]>;
  deleteJob(jobId: string): Promise<number>;
}
