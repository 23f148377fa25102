import { PipelineResult } from "../../domain/entities/pipeline-result";
import { PipelineError } from "../../domain/errors/pipeline.errors";
import { IArtifactStorage } from "../../domain/interfaces/iartifact.storage";
import { SlideProcessingContext } from "../pipeline/slide.processing.context";
import { ISlideProcessingStep } from "../pipeline/slide.processing.step";

export const RESULT_ARTIFACT = "result.json";

export class FinalizeStep implements ISlideProcessingStep {
  readonly name = "finalize" as const;
  readonly description = "Assembling slide deck";

  constructor(private readonly storage: IArtifactStorage) {}

  async execute(context: SlideProcessingContext): Promise<SlideProcessingContext> {
    const { metadata, cues, frames, subtitleTrack, subtitleArtifact } = context;
    if (!metadata || !cues || !frames || !subtitleTrack || !subtitleArtifact) {
      throw new PipelineError("Cannot assemble a result from an incomplete run");
    }

    const result: PipelineResult = {
      videoId: metadata.id,
      title: metadata.title,
      subtitleLanguage: subtitleTrack.language,
      subtitleArtifact,
      translatedSubtitleArtifact: context.translatedSubtitleArtifact,
      translatedTo: context.translatedTo,
      cues,
      frames,
      outline: context.outline,
      outlineProvider: context.outlineProvider,
      reconciliationEvents: context.reconciliationEvents,
      warnings: context.warnings,
      processingTimeSec: Math.round((Date.now() - context.startedAtMs) / 100) / 10,
    };

    await this.storage.put(
      context.jobId,
      RESULT_ARTIFACT,
      Buffer.from(JSON.stringify(result, null, 2), "utf-8"),
      "application/json"
    );
    return { ...context, result };
  }
}
