import { SubtitleCue } from "../../domain/entities/subtitle-cue";
import { errorMessage, PipelineError, ProviderCallError } from "../../domain/errors/pipeline.errors";
import { ITranscriptionProvider } from "../../domain/interfaces/itranscription.provider";
import { withTimeout } from "../services/concurrency";
import { SubtitleProcessor } from "../services/subtitle.processor";
import { SlideProcessingContext } from "../pipeline/slide.processing.context";
import { ISlideProcessingStep } from "../pipeline/slide.processing.step";

/**
 * Replaces the platform track with a speech-to-text transcript. When the
 * provider fails, a platform track fetched earlier is kept.
 */
export class AiTranscriptionStep implements ISlideProcessingStep {
  readonly name = "ai_transcription" as const;
  readonly description = "Transcribing audio";

  constructor(
    private readonly transcriptionProvider: ITranscriptionProvider,
    private readonly processor: SubtitleProcessor,
    private readonly timeoutMs: number
  ) {}

  shouldRun(context: SlideProcessingContext): boolean {
    return context.request.useAiTranscription;
  }

  async execute(context: SlideProcessingContext): Promise<SlideProcessingContext> {
    const { videoHandle, request } = context;
    if (!videoHandle) {
      throw new PipelineError("Transcription requested before the video was downloaded");
    }

    try {
      const transcription = await withTimeout(
        (signal) =>
          this.transcriptionProvider.transcribe(videoHandle, {
            apiKey: request.transcriptionApiKey,
            language: request.subtitleLanguagePreference?.[0],
            signal,
          }),
        this.timeoutMs,
        "Audio transcription"
      );

      const cues: SubtitleCue[] = transcription.segments
        .filter((segment) => segment.text.trim().length > 0)
        .map((segment, i) => ({
          index: i + 1,
          startOffset: segment.startSec,
          endOffset: segment.endSec,
          sourceText: segment.text.trim(),
        }));
      if (cues.length === 0) {
        throw new ProviderCallError("Transcription returned no speech");
      }

      console.log(`[AiTranscriptionStep] Transcribed ${cues.length} segments (${transcription.language})`);
      return {
        ...context,
        subtitleTrack: {
          rawText: this.processor.serialize(cues),
          language: transcription.language,
          isAutoGenerated: false,
        },
      };
    } catch (error) {
      if (!context.subtitleTrack) {
        throw error instanceof ProviderCallError
          ? error
          : new ProviderCallError("AI transcription failed", { cause: error });
      }
      const message = `AI transcription failed (${errorMessage(error)}), using platform subtitles`;
      console.warn(`[AiTranscriptionStep] ${message}`);
      return { ...context, warnings: [...context.warnings, { step: this.name, message }] };
    }
  }
}
