import { errorMessage, FetchError, PipelineError } from "../../domain/errors/pipeline.errors";
import { ISubtitleSource, SubtitleTrack } from "../../domain/interfaces/isubtitle.source";
import { withTimeout } from "../services/concurrency";
import { SlideProcessingContext } from "../pipeline/slide.processing.context";
import { ISlideProcessingStep } from "../pipeline/slide.processing.step";

/**
 * Downloads the platform subtitle track. Missing subtitles are only fatal when
 * AI transcription is not going to produce a track instead.
 */
export class FetchSubtitlesStep implements ISlideProcessingStep {
  readonly name = "fetch_subtitles" as const;
  readonly description = "Downloading subtitles";

  constructor(
    private readonly subtitleSource: ISubtitleSource,
    private readonly timeoutMs: number
  ) {}

  async execute(context: SlideProcessingContext): Promise<SlideProcessingContext> {
    const { videoHandle, metadata, request } = context;
    if (!videoHandle || !metadata) {
      throw new PipelineError("Subtitles requested before the video was downloaded");
    }

    let track: SubtitleTrack | null;
    try {
      track = await withTimeout(
        (signal) => this.subtitleSource.fetch(videoHandle, metadata, request.subtitleLanguagePreference, { signal }),
        this.timeoutMs,
        "Subtitle download"
      );
    } catch (error) {
      if (!request.useAiTranscription) {
        throw new FetchError("Could not download subtitles", { cause: error });
      }
      const message = `Platform subtitles unavailable (${errorMessage(error)}), relying on AI transcription`;
      console.warn(`[FetchSubtitlesStep] ${message}`);
      return { ...context, warnings: [...context.warnings, { step: this.name, message }] };
    }

    if (!track) {
      if (!request.useAiTranscription) {
        throw new FetchError("This video has no subtitles in the requested languages");
      }
      console.log(`[FetchSubtitlesStep] No platform subtitles, relying on AI transcription`);
      return context;
    }

    console.log(
      `[FetchSubtitlesStep] Got ${track.language} subtitles (${track.isAutoGenerated ? "auto-generated" : "manual"})`
    );
    return { ...context, subtitleTrack: track };
  }
}
