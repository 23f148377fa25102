import { Job } from "../../domain/entities/job";
import { isTerminalStatus } from "../../domain/enums/job-status";
import { CancellationRequested, errorMessage, PipelineError } from "../../domain/errors/pipeline.errors";
import { IJobStore } from "../../domain/interfaces/ijob.store";
import { stepProgress, stepStartProgress } from "./progress.table";
import { createContext, SlideProcessingContext } from "./slide.processing.context";
import { ISlideProcessingStep, StepReporter } from "./slide.processing.step";

export interface SlideProcessingPipelineOptions {
  /** Runs after every run, whatever the outcome (e.g. removing downloaded media). */
  onSettled?: (context: SlideProcessingContext) => Promise<void>;
}

export class SlideProcessingPipeline {
  constructor(
    private readonly steps: ISlideProcessingStep[],
    private readonly jobStore: IJobStore,
    private readonly options: SlideProcessingPipelineOptions = {}
  ) {}

  /**
   * Drives one job through every step. The job record is the only output:
   * failures and cancellation end up as terminal states, never as rejections.
   */
  async run(jobId: string): Promise<Job | null> {
    const job = await this.jobStore.findById(jobId);
    if (!job) {
      console.warn(`[SlideProcessingPipeline] Job ${jobId} not found`);
      return null;
    }
    if (isTerminalStatus(job.status)) {
      console.log(`[SlideProcessingPipeline] Job ${jobId} already ${job.status}, not running`);
      return job;
    }

    let ctx = createContext(jobId, job.request);
    let currentStep = "prepare";
    console.log(`[SlideProcessingPipeline] Running ${this.steps.length} steps for job ${jobId}`);

    try {
      await this.throwIfCancelled(jobId);
      await this.jobStore.update(jobId, { status: "running", startedAt: new Date() });

      for (let i = 0; i < this.steps.length; i++) {
        const step = this.steps[i];
        currentStep = step.name;
        await this.throwIfCancelled(jobId);

        if (step.shouldRun && !step.shouldRun(ctx)) {
          console.log(`[SlideProcessingPipeline] Skipping step ${i + 1}/${this.steps.length}: ${step.name}`);
          await this.jobStore.recordProgress(jobId, {
            step: step.name,
            progress: stepStartProgress(step.name),
            message: `${step.description} (skipped)`,
          });
          continue;
        }

        console.log(`[SlideProcessingPipeline] Executing step ${i + 1}/${this.steps.length}: ${step.name}`);
        await this.jobStore.recordProgress(jobId, {
          step: step.name,
          progress: stepStartProgress(step.name),
          message: step.description,
        });
        ctx = await step.execute(ctx, this.reporterFor(jobId, step));
      }

      await this.throwIfCancelled(jobId);
      const finished = await this.jobStore.recordProgress(jobId, {
        step: "complete",
        progress: 100,
        status: "completed",
        message: `Created ${ctx.frames?.length ?? 0} slides`,
        patch: { result: ctx.result, completedAt: new Date() },
      });
      console.log(`[SlideProcessingPipeline] Job ${jobId} completed`);
      return finished;
    } catch (error) {
      return await this.settleFailure(jobId, currentStep, error);
    } finally {
      if (this.options.onSettled) {
        await this.options.onSettled(ctx).catch((error) => {
          console.error(`[SlideProcessingPipeline] Cleanup for job ${jobId} failed:`, error);
        });
      }
    }
  }

  private async settleFailure(jobId: string, step: string, error: unknown): Promise<Job | null> {
    const current = await this.jobStore.findById(jobId);
    const progress = current?.progress ?? 0;

    if (error instanceof CancellationRequested) {
      console.log(`[SlideProcessingPipeline] Job ${jobId} cancelled during ${step}`);
      return this.jobStore.recordProgress(jobId, {
        step: "cancelled",
        progress,
        status: "cancelled",
        message: `Cancelled during ${step}`,
        patch: { completedAt: new Date() },
      });
    }

    const message = errorMessage(error);
    const errorCause = error instanceof PipelineError ? error.rootCauseMessage() : undefined;
    console.error(`[SlideProcessingPipeline] Step ${step} failed for job ${jobId}:`, error);
    return this.jobStore.recordProgress(jobId, {
      step: "failed",
      progress,
      status: "failed",
      message: `Failed during ${step}: ${message}`,
      patch: { error: message, errorCause, completedAt: new Date() },
    });
  }

  private async isCancelled(jobId: string): Promise<boolean> {
    const job = await this.jobStore.findById(jobId);
    return job === null || job.cancelRequested;
  }

  private async throwIfCancelled(jobId: string): Promise<void> {
    if (await this.isCancelled(jobId)) {
      throw new CancellationRequested(jobId);
    }
  }

  private reporterFor(jobId: string, step: ISlideProcessingStep): StepReporter {
    return {
      progress: async (fraction, message) => {
        await this.jobStore.recordProgress(jobId, {
          step: step.name,
          progress: stepProgress(step.name, fraction),
          message,
        });
      },
      isCancelled: () => this.isCancelled(jobId),
      throwIfCancelled: () => this.throwIfCancelled(jobId),
    };
  }
}
