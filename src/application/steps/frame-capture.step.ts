import { CapturedFrame } from "../../domain/entities/frame-spec";
import { qualityToHeight } from "../../domain/enums/video-quality";
import { FrameCaptureError, PipelineError } from "../../domain/errors/pipeline.errors";
import { IArtifactStorage } from "../../domain/interfaces/iartifact.storage";
import { IFrameCapture } from "../../domain/interfaces/iframe.capture";
import { withTimeout } from "../services/concurrency";
import { SlideProcessingContext } from "../pipeline/slide.processing.context";
import { ISlideProcessingStep, StepReporter } from "../pipeline/slide.processing.step";

export function frameArtifactName(index: number, extension: string): string {
  return `frame_${String(index).padStart(4, "0")}.${extension}`;
}

/** Cuts one still per FrameSpec. Any failed frame fails the job. */
export class FrameCaptureStep implements ISlideProcessingStep {
  readonly name = "frame_capture" as const;
  readonly description = "Capturing frames";

  constructor(
    private readonly frameCapture: IFrameCapture,
    private readonly storage: IArtifactStorage,
    private readonly timeoutMs: number
  ) {}

  async execute(context: SlideProcessingContext, reporter: StepReporter): Promise<SlideProcessingContext> {
    const { videoHandle, frameSpecs, cues } = context;
    if (!videoHandle || !frameSpecs || !cues) {
      throw new PipelineError("Frame capture requested before keyframes were selected");
    }

    const cueByIndex = new Map(cues.map((cue) => [cue.index, cue]));
    const height = qualityToHeight(context.request.quality);
    const frames: CapturedFrame[] = [];

    for (const spec of frameSpecs) {
      let bytes: Buffer;
      try {
        bytes = await withTimeout(
          (signal) => this.frameCapture.extract(videoHandle, spec.timestamp, { height, signal }),
          this.timeoutMs,
          `Frame ${spec.index}`
        );
      } catch (error) {
        throw new FrameCaptureError(spec.timestamp, { cause: error });
      }

      const artifactName = frameArtifactName(spec.index, this.frameCapture.extension);
      await this.storage.put(context.jobId, artifactName, bytes, this.frameCapture.contentType);

      const cue = cueByIndex.get(spec.cueIndex);
      frames.push({
        ...spec,
        artifactName,
        sizeBytes: bytes.length,
        subtitle: cue?.sourceText ?? "",
        translatedSubtitle: cue?.translatedText,
      });

      if (spec.index % 10 === 0 || spec.index === frameSpecs.length) {
        await reporter.progress(spec.index / frameSpecs.length, `Captured ${spec.index}/${frameSpecs.length} frames`);
      }
    }

    console.log(`[FrameCaptureStep] Captured ${frames.length} frames`);
    return { ...context, frames };
  }
}
