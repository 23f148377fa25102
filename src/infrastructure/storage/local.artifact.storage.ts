import { promises as fs } from "fs";
import path from "path";
import { IArtifactStorage } from "../../domain/interfaces/iartifact.storage";

const SAFE_SEGMENT = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function assertSafeSegment(kind: string, value: string): void {
  if (!SAFE_SEGMENT.test(value) || value.includes("..")) {
    throw new Error(`Invalid ${kind}: ${value}`);
  }
}

/**
 * Stores artifacts on the local filesystem under <rootDir>/jobs/<jobId>/.
 */
export class LocalArtifactStorage implements IArtifactStorage {
  constructor(private readonly rootDir: string) {}

  private jobDir(jobId: string): string {
    assertSafeSegment("job id", jobId);
    return path.resolve(this.rootDir, "jobs", jobId);
  }

  private artifactPath(jobId: string, artifactName: string): string {
    assertSafeSegment("artifact name", artifactName);
    return path.join(this.jobDir(jobId), artifactName);
  }

  async put(jobId: string, artifactName: string, bytes: Buffer): Promise<string> {
    const target = this.artifactPath(jobId, artifactName);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, bytes);
    return target;
  }

  async get(jobId: string, artifactName: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.artifactPath(jobId, artifactName));
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async list(jobId: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.jobDir(jobId));
      return entries.sort();
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  }

  async deleteJob(jobId: string): Promise<number> {
    const names = await this.list(jobId);
    await fs.rm(this.jobDir(jobId), { recursive: true, force: true });
    return names.length;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
