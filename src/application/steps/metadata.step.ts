import { FetchError } from "../../domain/errors/pipeline.errors";
import { IVideoSource } from "../../domain/interfaces/ivideo.source";
import { withTimeout } from "../services/concurrency";
import { SlideProcessingContext } from "../pipeline/slide.processing.context";
import { ISlideProcessingStep } from "../pipeline/slide.processing.step";

export class MetadataStep implements ISlideProcessingStep {
  readonly name = "metadata" as const;
  readonly description = "Reading video information";

  constructor(
    private readonly videoSource: IVideoSource,
    private readonly timeoutMs: number
  ) {}

  async execute(context: SlideProcessingContext): Promise<SlideProcessingContext> {
    try {
      const metadata = await withTimeout(
        (signal) => this.videoSource.probe(context.request.url, { signal }),
        this.timeoutMs,
        "Video metadata"
      );
      console.log(`[MetadataStep] ${metadata.id}: "${metadata.title}" (${metadata.durationSec ?? "?"}s)`);
      return { ...context, metadata };
    } catch (error) {
      throw new FetchError("Could not read video information", { cause: error });
    }
  }
}
