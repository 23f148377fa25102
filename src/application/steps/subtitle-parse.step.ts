import { PipelineError } from "../../domain/errors/pipeline.errors";
import { IArtifactStorage } from "../../domain/interfaces/iartifact.storage";
import { SubtitleProcessor } from "../services/subtitle.processor";
import { SlideProcessingContext } from "../pipeline/slide.processing.context";
import { ISlideProcessingStep } from "../pipeline/slide.processing.step";

export class SubtitleParseStep implements ISlideProcessingStep {
  readonly name = "subtitle_parse" as const;
  readonly description = "Parsing subtitles";

  constructor(
    private readonly processor: SubtitleProcessor,
    private readonly storage: IArtifactStorage
  ) {}

  async execute(context: SlideProcessingContext): Promise<SlideProcessingContext> {
    const track = context.subtitleTrack;
    if (!track) {
      throw new PipelineError("No subtitle track to parse");
    }

    const { cues, warnings } = this.processor.parse(track.rawText);
    if (warnings.length > 0) {
      console.warn(`[SubtitleParseStep] ${warnings.length} subtitle block(s) skipped or corrected`);
    }
    if (cues.length === 0) {
      throw new PipelineError("The subtitle track contains no usable cues");
    }

    const subtitleArtifact = `subtitles.${track.language}.srt`;
    await this.storage.put(
      context.jobId,
      subtitleArtifact,
      Buffer.from(this.processor.serialize(cues), "utf-8"),
      "application/x-subrip"
    );

    console.log(`[SubtitleParseStep] Parsed ${cues.length} cues`);
    return {
      ...context,
      cues,
      subtitleArtifact,
      warnings: [
        ...context.warnings,
        ...warnings.map((w) => ({ step: this.name, message: `Block ${w.blockNumber}: ${w.reason} (${w.excerpt})` })),
      ],
    };
  }
}
