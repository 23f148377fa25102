import { randomUUID } from "crypto";
import { Collection, Db, WithId } from "mongodb";
import { Job, JobProgressEvent, JobRequest } from "../../../domain/entities/job";
import { JobStatus } from "../../../domain/enums/job-status";
import { IJobStore, JobPatch } from "../../../domain/interfaces/ijob.store";
import { createQueuedJob, DEFAULT_HISTORY_LIMIT, historyEntry, nextProgress } from "../../../domain/utils/job-state";

// Mapped copy of Job: Collection<T> needs a schema type with an implicit index signature
export type JobDocument = { [K in keyof Job]: Job[K] };

const TERMINAL_STATUSES: JobStatus[] = ["completed", "failed", "cancelled"];

/**
 * MongoDB-backed job store. Jobs are addressed by their UUID `id`, never by
 * `_id`. Writes to a terminal job are filtered out at the query level.
 */
export class MongoJobRepository implements IJobStore {
  private readonly collection: Collection<JobDocument>;

  constructor(
    db: Db,
    private readonly historyLimit: number = DEFAULT_HISTORY_LIMIT,
    collectionName: string = "slideJobs"
  ) {
    this.collection = db.collection<JobDocument>(collectionName);
    this.ensureIndexes().catch((error) => {
      console.error(`[MongoJobRepository] Failed to create indexes for ${collectionName}:`, error);
    });
  }

  private async ensureIndexes(): Promise<void> {
    await this.collection.createIndex({ id: 1 }, { unique: true });
    await this.collection.createIndex({ createdAt: -1 });
    await this.collection.createIndex({ status: 1, updatedAt: 1 });
  }

  private toDomain(doc: WithId<JobDocument>): Job {
    const { _id, ...job } = doc;
    return job;
  }

  async create(request: JobRequest): Promise<Job> {
    const job = createQueuedJob(randomUUID(), request);
    await this.collection.insertOne({ ...job });
    return job;
  }

  async findById(id: string): Promise<Job | null> {
    const doc = await this.collection.findOne({ id });
    return doc ? this.toDomain(doc) : null;
  }

  async findRecent(limit: number = 50): Promise<Job[]> {
    const docs = await this.collection.find({}).sort({ createdAt: -1 }).limit(limit).toArray();
    return docs.map((doc) => this.toDomain(doc));
  }

  async recordProgress(id: string, event: JobProgressEvent): Promise<Job | null> {
    // Single writer per job, so reading the current progress first is safe
    const current = await this.findById(id);
    if (!current || TERMINAL_STATUSES.includes(current.status)) {
      return current;
    }

    const now = new Date();
    const status = event.status ?? current.status;
    const progress = nextProgress(current.progress, event.progress);
    const result = await this.collection.findOneAndUpdate(
      { id, status: { $nin: TERMINAL_STATUSES } },
      {
        $set: {
          ...event.patch,
          status,
          currentStep: event.step,
          message: event.message,
          updatedAt: now,
        },
        $max: { progress },
        $push: { history: { $each: [historyEntry(event, status, progress, now)], $slice: -this.historyLimit } },
      },
      { returnDocument: "after" }
    );
    return result ? this.toDomain(result) : this.findById(id);
  }

  async update(id: string, patch: JobPatch): Promise<Job | null> {
    const result = await this.collection.findOneAndUpdate(
      { id, status: { $nin: TERMINAL_STATUSES } },
      { $set: { ...patch, updatedAt: new Date() } },
      { returnDocument: "after" }
    );
    return result ? this.toDomain(result) : this.findById(id);
  }

  async requestCancellation(id: string): Promise<Job | null> {
    await this.collection.updateOne(
      { id, status: { $nin: TERMINAL_STATUSES } },
      { $set: { cancelRequested: true, updatedAt: new Date() } }
    );
    return this.findById(id);
  }

  async cancelIfQueued(id: string, message: string): Promise<Job | null> {
    const now = new Date();
    // Queued jobs have made no progress yet
    const entry = historyEntry({ step: "cancelled", progress: 0, message }, "cancelled", 0, now);
    const result = await this.collection.findOneAndUpdate(
      { id, status: "queued" },
      {
        $set: { status: "cancelled", currentStep: "cancelled", message, completedAt: now, updatedAt: now },
        $push: { history: { $each: [entry], $slice: -this.historyLimit } },
      },
      { returnDocument: "after" }
    );
    return result ? this.toDomain(result) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.collection.deleteOne({ id });
    return result.deletedCount > 0;
  }

  async findTerminalBefore(date: Date, limit: number = 100): Promise<Job[]> {
    const docs = await this.collection
      .find({ status: { $in: TERMINAL_STATUSES }, updatedAt: { $lt: date } })
      .limit(limit)
      .toArray();
    return docs.map((doc) => this.toDomain(doc));
  }
}
