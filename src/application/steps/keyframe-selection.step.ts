import { PipelineError } from "../../domain/errors/pipeline.errors";
import { KeyframeSelector } from "../services/keyframe.selector";
import { SlideProcessingContext } from "../pipeline/slide.processing.context";
import { ISlideProcessingStep } from "../pipeline/slide.processing.step";

export class KeyframeSelectionStep implements ISlideProcessingStep {
  readonly name = "keyframe_selection" as const;
  readonly description = "Selecting keyframes";

  constructor(private readonly selector: KeyframeSelector) {}

  async execute(context: SlideProcessingContext): Promise<SlideProcessingContext> {
    if (!context.cues) {
      throw new PipelineError("Keyframes requested before subtitles were parsed");
    }
    const frameSpecs = this.selector.select(context.cues, {
      position: context.request.screenshotPosition,
      offset: context.request.screenshotOffset,
      videoDuration: context.metadata?.durationSec,
    });
    console.log(`[KeyframeSelectionStep] Selected ${frameSpecs.length} keyframes`);
    return { ...context, frameSpecs };
  }
}
