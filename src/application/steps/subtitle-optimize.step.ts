import { errorMessage, PipelineError } from "../../domain/errors/pipeline.errors";
import { SubtitleOptimizer } from "../services/subtitle.optimizer";
import { SubtitleProcessor } from "../services/subtitle.processor";
import { SlideProcessingContext } from "../pipeline/slide.processing.context";
import { ISlideProcessingStep } from "../pipeline/slide.processing.step";

const MIN_REDUCTION_PERCENT = 30;

export class SubtitleOptimizeStep implements ISlideProcessingStep {
  readonly name = "subtitle_optimize" as const;
  readonly description = "Optimizing subtitles";

  constructor(
    private readonly processor: SubtitleProcessor,
    private readonly optimizer: SubtitleOptimizer
  ) {}

  async execute(context: SlideProcessingContext): Promise<SlideProcessingContext> {
    const track = context.subtitleTrack;
    if (!track) {
      throw new PipelineError("No subtitle track to optimize");
    }

    try {
      let { cues } = this.processor.parse(track.rawText);
      const originalCount = cues.length;

      if (track.isAutoGenerated) {
        const merged = this.optimizer.optimize(cues, track.language);
        if (merged.reductionPercentage > MIN_REDUCTION_PERCENT) {
          console.log(
            `[SubtitleOptimizeStep] ${merged.strategy} merge: ${merged.originalCount} -> ${merged.mergedCount} cues (-${merged.reductionPercentage}%)`
          );
          cues = merged.cues;
        } else {
          console.log(`[SubtitleOptimizeStep] Merge only saved ${merged.reductionPercentage}%, keeping original cues`);
        }
      }

      const wrapped = this.processor.wrapCues(cues);
      if (cues.length === originalCount && wrapped.changed === 0) {
        return context;
      }
      console.log(`[SubtitleOptimizeStep] Re-wrapped ${wrapped.changed} cue(s)`);
      return { ...context, subtitleTrack: { ...track, rawText: this.processor.serialize(wrapped.cues) } };
    } catch (error) {
      const message = `Subtitle optimization failed (${errorMessage(error)}), using the original track`;
      console.warn(`[SubtitleOptimizeStep] ${message}`);
      return { ...context, warnings: [...context.warnings, { step: this.name, message }] };
    }
  }
}
