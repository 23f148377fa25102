import { CapturedFrame } from "../../domain/entities/frame-spec";
import { PipelineWarning } from "../../domain/entities/pipeline-result";
import { errorMessage, PipelineError } from "../../domain/errors/pipeline.errors";
import { IArtifactStorage } from "../../domain/interfaces/iartifact.storage";
import { IFrameCapture } from "../../domain/interfaces/iframe.capture";
import { withTimeout } from "../services/concurrency";
import { SlideProcessingContext } from "../pipeline/slide.processing.context";
import { ISlideProcessingStep, StepReporter } from "../pipeline/slide.processing.step";

/** Re-encodes stored frames. A frame that fails keeps its original bytes. */
export class FrameOptimizeStep implements ISlideProcessingStep {
  readonly name = "frame_optimize" as const;
  readonly description = "Optimizing frames";

  constructor(
    private readonly frameCapture: IFrameCapture,
    private readonly storage: IArtifactStorage,
    private readonly timeoutMs: number
  ) {}

  async execute(context: SlideProcessingContext, reporter: StepReporter): Promise<SlideProcessingContext> {
    if (!context.frames) {
      throw new PipelineError("Frame optimization requested before frames were captured");
    }

    const frames: CapturedFrame[] = [];
    const warnings: PipelineWarning[] = [];
    let savedBytes = 0;

    for (let i = 0; i < context.frames.length; i++) {
      const frame = context.frames[i];
      try {
        const original = await this.storage.get(context.jobId, frame.artifactName);
        if (!original) {
          throw new PipelineError(`${frame.artifactName} is missing from storage`);
        }
        const optimized = await withTimeout(
          (signal) => this.frameCapture.optimize(original, { signal }),
          this.timeoutMs,
          `Optimizing ${frame.artifactName}`
        );
        if (optimized.length > 0 && optimized.length < original.length) {
          await this.storage.put(context.jobId, frame.artifactName, optimized, this.frameCapture.contentType);
          savedBytes += original.length - optimized.length;
          frames.push({ ...frame, sizeBytes: optimized.length });
        } else {
          frames.push(frame);
        }
      } catch (error) {
        const message = `${frame.artifactName} kept unoptimized: ${errorMessage(error)}`;
        console.warn(`[FrameOptimizeStep] ${message}`);
        warnings.push({ step: this.name, message });
        frames.push(frame);
      }

      if ((i + 1) % 10 === 0 || i + 1 === context.frames.length) {
        await reporter.progress((i + 1) / context.frames.length, `Optimized ${i + 1}/${context.frames.length} frames`);
      }
    }

    console.log(`[FrameOptimizeStep] Optimized ${frames.length} frames, saved ${Math.round(savedBytes / 1024)} KB`);
    return { ...context, frames, warnings: [...context.warnings, ...warnings] };
  }
}
