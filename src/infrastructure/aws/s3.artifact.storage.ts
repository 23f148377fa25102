import {
  DeleteObjectsCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { IArtifactStorage } from "../../domain/interfaces/iartifact.storage";
import { assertSafeSegment } from "../storage/local.artifact.storage";

/**
 * Configuration for S3ArtifactStorage.
 */
export interface S3ArtifactStorageConfig {
  bucket: string;
  region?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  endpoint?: string; // For S3-compatible services like MinIO
  forcePathStyle?: boolean;
  prefix?: string; // Default: "jobs"
}

/**
 * Stores artifacts in S3 under <prefix>/<jobId>/<artifactName>.
 */
export class S3ArtifactStorage implements IArtifactStorage {
  private s3Client: S3Client;
  private bucket: string;
  private prefix: string;

  constructor(config: S3ArtifactStorageConfig) {
    const region = config.region || "us-east-1";
    console.log(`[S3ArtifactStorage] Initializing with bucket ${config.bucket} in ${region}`);

    this.s3Client = new S3Client({
      region,
      credentials: config.credentials,
      endpoint: config.endpoint,
      forcePathStyle: config.forcePathStyle || false,
    });
    this.bucket = config.bucket;
    this.prefix = (config.prefix ?? "jobs").replace(/\/+$/, "");
  }

  private jobPrefix(jobId: string): string {
    assertSafeSegment("job id", jobId);
    return `${this.prefix}/${jobId}/`;
  }

  private key(jobId: string, artifactName: string): string {
    assertSafeSegment("artifact name", artifactName);
    return `${this.jobPrefix(jobId)}${artifactName}`;
  }

  async put(jobId: string, artifactName: string, bytes: Buffer, contentType?: string): Promise<string> {
    const key = this.key(jobId, artifactName);
    await this.s3Client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: bytes,
        ContentType: contentType || "application/octet-stream",
      })
    );
    return `s3://${this.bucket}/${key}`;
  }

  async get(jobId: string, artifactName: string): Promise<Buffer | null> {
    try {
      const response = await this.s3Client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: this.key(jobId, artifactName) })
      );
      if (!response.Body) {
        return null;
      }
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      if (error instanceof NoSuchKey) {
        return null;
      }
      throw error;
    }
  }

  async list(jobId: string): Promise<string[]> {
    return (await this.listKeys(jobId)).map((key) => key.slice(this.jobPrefix(jobId).length)).sort();
  }

  async deleteJob(jobId: string): Promise<number> {
    const keys = await this.listKeys(jobId);
    // DeleteObjects takes at most 1000 keys per call
    for (let i = 0; i < keys.length; i += 1000) {
      await this.s3Client.send(
        new DeleteObjectsCommand({
          Bucket: this.bucket,
          Delete: { Objects: keys.slice(i, i + 1000).map((Key) => ({ Key })) },
        })
      );
    }
    console.log(`[S3ArtifactStorage] Deleted ${keys.length} object(s) for job ${jobId}`);
    return keys.length;
  }

  private async listKeys(jobId: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;
    do {
      const page = await this.s3Client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: this.jobPrefix(jobId),
          ContinuationToken: continuationToken,
        })
      );
      for (const object of page.Contents ?? []) {
        if (object.Key) keys.push(object.Key);
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);
    return keys;
  }
}
