import { errorMessage } from "../../domain/errors/pipeline.errors";
import { SlideProcessingPipeline } from "../pipeline/slide.processing.pipeline";

/**
 * Runs pipelines in the background with at most `maxConcurrentJobs` at once.
 * Jobs past the limit wait in submission order.
 */
export class JobRunner {
  private readonly queue: string[] = [];
  private readonly active = new Set<string>();
  private readonly idleWaiters: Array<() => void> = [];

  constructor(
    private readonly pipeline: SlideProcessingPipeline,
    private readonly maxConcurrentJobs: number
  ) {}

  enqueue(jobId: string): void {
    this.queue.push(jobId);
    console.log(`[JobRunner] Queued job ${jobId} (active: ${this.active.size}, waiting: ${this.queue.length})`);
    this.drain();
  }

  get activeCount(): number {
    return this.active.size;
  }

  get waitingCount(): number {
    return this.queue.length;
  }

  /** Resolves once nothing is running or waiting. */
  whenIdle(): Promise<void> {
    if (this.active.size === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private drain(): void {
    while (this.active.size < this.maxConcurrentJobs && this.queue.length > 0) {
      const jobId = this.queue.shift();
      if (jobId === undefined) break;
      this.active.add(jobId);

      void this.pipeline
        .run(jobId)
        .catch((error) => {
          console.error(`[JobRunner] Job ${jobId} crashed: ${errorMessage(error)}`, error);
        })
        .finally(() => {
          this.active.delete(jobId);
          this.drain();
        });
    }

    if (this.active.size === 0 && this.queue.length === 0) {
      this.idleWaiters.splice(0).forEach((resolve) => resolve());
    }
  }
}
