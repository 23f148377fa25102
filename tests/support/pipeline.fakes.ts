import { VideoHandle, VideoMetadata } from "../../src/domain/entities/video-metadata";
import { AiProvider, AiProviders } from "../../src/domain/enums/ai-provider";
import { VideoQuality } from "../../src/domain/enums/video-quality";
import { IArtifactStorage } from "../../src/domain/interfaces/iartifact.storage";
import { FrameExtractOptions, IFrameCapture } from "../../src/domain/interfaces/iframe.capture";
import { IMachineTranslator } from "../../src/domain/interfaces/imachine.translator";
import { ISubtitleSource, SubtitleTrack } from "../../src/domain/interfaces/isubtitle.source";
import { ITextGenerationProvider } from "../../src/domain/interfaces/itext.generation.provider";
import {
  AiProviderStatus,
  ITextGenerationProviderFactory,
} from "../../src/domain/interfaces/itext.generation.provider.factory";
import { ITranscriptionProvider, TranscriptionResult } from "../../src/domain/interfaces/itranscription.provider";
import { IVideoSource, VideoFetchOptions, VideoFetchResult } from "../../src/domain/interfaces/ivideo.source";

export const METADATA: VideoMetadata = {
  id: "vid123",
  title: "Tides Explained",
  durationSec: 8,
  description: "A short lesson about tides.",
  availableSubtitles: ["en"],
  automaticCaptions: [],
};

export const SRT_EN = [
  "1",
  "00:00:00,000 --> 00:00:02,000",
  "The moon pulls the ocean.",
  "",
  "2",
  "00:00:02,000 --> 00:00:04,000",
  "That makes the tide rise.",
  "",
  "3",
  "00:00:04,000 --> 00:00:06,000",
  "It happens twice a day.",
  "",
].join("\n");

export class FakeVideoSource implements IVideoSource {
  readonly released: VideoHandle[] = [];
  probeError?: Error;

  async probe(): Promise<VideoMetadata> {
    if (this.probeError) {
      throw this.probeError;
    }
    return METADATA;
  }

  async fetch(url: string, _quality: VideoQuality, options: VideoFetchOptions = {}): Promise<VideoFetchResult> {
    options.onProgress?.(50);
    options.onProgress?.(100);
    return { videoHandle: { videoId: METADATA.id, sourceUrl: url, filePath: "/tmp/vid123.mp4" }, metadata: METADATA };
  }

  async release(videoHandle: VideoHandle): Promise<void> {
    this.released.push(videoHandle);
  }
}

export class FakeSubtitleSource implements ISubtitleSource {
  constructor(public track: SubtitleTrack | null = { rawText: SRT_EN, language: "en", isAutoGenerated: false }) {}

  async fetch(): Promise<SubtitleTrack | null> {
    return this.track;
  }
}

export class FakeFrameCapture implements IFrameCapture {
  readonly extension = "jpg";
  readonly contentType = "image/jpeg";
  readonly extracted: number[] = [];
  optimizeCalls = 0;
  failAt?: number;
  afterExtract?: (timestamp: number) => Promise<void>;

  async extract(_videoHandle: VideoHandle, timestamp: number, _options?: FrameExtractOptions): Promise<Buffer> {
    if (this.failAt === timestamp) {
      throw new Error("disk full");
    }
    this.extracted.push(timestamp);
    await this.afterExtract?.(timestamp);
    return Buffer.from(`frame@${timestamp}`.padEnd(40, "."));
  }

  async optimize(image: Buffer): Promise<Buffer> {
    this.optimizeCalls++;
    return image.subarray(0, 20);
  }
}

export class FakeTranscriptionProvider implements ITranscriptionProvider {
  calls = 0;

  constructor(private readonly result: TranscriptionResult | Error) {}

  async transcribe(): Promise<TranscriptionResult> {
    this.calls++;
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

export class FakeMachineTranslator implements IMachineTranslator {
  async translate(text: string, _sourceLang: string, targetLang: string): Promise<string> {
    return `[${targetLang}] ${text}`;
  }
}

export class FakeProviderFactory implements ITextGenerationProviderFactory {
  constructor(
    private readonly provider: ITextGenerationProvider,
    private readonly configured: AiProvider[] = [...AiProviders]
  ) {}

  create(): ITextGenerationProvider {
    return this.provider;
  }

  isConfigured(name: AiProvider): boolean {
    return this.configured.includes(name);
  }

  describe(): AiProviderStatus[] {
    return AiProviders.map((name) => ({ name, defaultModel: "test-model", configured: this.isConfigured(name) }));
  }
}

export class MemoryArtifactStorage implements IArtifactStorage {
  readonly files = new Map<string, Buffer>();

  async put(jobId: string, artifactName: string, bytes: Buffer): Promise<string> {
    this.files.set(`${jobId}/${artifactName}`, bytes);
    return `memory://${jobId}/${artifactName}`;
  }

  async get(jobId: string, artifactName: string): Promise<Buffer | null> {
    return this.files.get(`${jobId}/${artifactName}`) ?? null;
  }

  async list(jobId: string): Promise<string[]> {
    return [...this.files.keys()]
      .filter((key) => key.startsWith(`${jobId}/`))
      .map((key) => key.slice(jobId.length + 1))
      .sort();
  }

  async deleteJob(jobId: string): Promise<number> {
    const names = await this.list(jobId);
    names.forEach((name) => this.files.delete(`${jobId}/${name}`));
    return names.length;
  }
}
