import { FetchError } from "../../domain/errors/pipeline.errors";
import { IVideoSource } from "../../domain/interfaces/ivideo.source";
import { withTimeout } from "../services/concurrency";
import { SlideProcessingContext } from "../pipeline/slide.processing.context";
import { ISlideProcessingStep, StepReporter } from "../pipeline/slide.processing.step";

export class DownloadVideoStep implements ISlideProcessingStep {
  readonly name = "download_video" as const;
  readonly description = "Downloading video";

  constructor(
    private readonly videoSource: IVideoSource,
    private readonly timeoutMs: number
  ) {}

  async execute(context: SlideProcessingContext, reporter: StepReporter): Promise<SlideProcessingContext> {
    // Progress writes are chained so they land in order
    let reported = 0;
    let progressChain: Promise<void> = Promise.resolve();
    const onProgress = (percent: number) => {
      const bucket = Math.floor(percent / 10) * 10;
      if (bucket <= reported) return;
      reported = bucket;
      progressChain = progressChain.then(() => reporter.progress(bucket / 100, `Downloading video ${bucket}%`));
    };

    try {
      const { videoHandle, metadata } = await withTimeout(
        (signal) => this.videoSource.fetch(context.request.url, context.request.quality, { signal, onProgress }),
        this.timeoutMs,
        "Video download"
      );
      await progressChain;
      console.log(`[DownloadVideoStep] Downloaded ${videoHandle.videoId} to ${videoHandle.filePath}`);
      return {
        ...context,
        videoHandle,
        metadata: context.metadata
          ? { ...metadata, ...context.metadata, durationSec: context.metadata.durationSec ?? metadata.durationSec }
          : metadata,
      };
    } catch (error) {
      await progressChain.catch((progressError) => {
        console.warn(`[DownloadVideoStep] Progress update failed:`, progressError);
      });
      throw new FetchError("Could not download the video", { cause: error });
    }
  }
}
