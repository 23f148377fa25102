import { VideoMetadata } from "../../domain/entities/video-metadata";
import { FetchError } from "../../domain/errors/pipeline.errors";
import { IVideoSource } from "../../domain/interfaces/ivideo.source";
import { withTimeout } from "../services/concurrency";

export class GetVideoInfoUseCase {
  constructor(
    private videoSource: IVideoSource,
    private timeoutMs: number
  ) {}

  async execute(url: string): Promise<VideoMetadata> {
    try {
      return await withTimeout((signal) => this.videoSource.probe(url, { signal }), this.timeoutMs, "Video probe");
    } catch (error) {
      throw new FetchError(`Could not read video info for ${url}`, { cause: error });
    }
  }
}
