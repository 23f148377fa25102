import { IArtifactStorage } from "../../domain/interfaces/iartifact.storage";
import { IFrameCapture } from "../../domain/interfaces/iframe.capture";
import { IMachineTranslator } from "../../domain/interfaces/imachine.translator";
import { ISubtitleSource } from "../../domain/interfaces/isubtitle.source";
import { ITextGenerationProviderFactory } from "../../domain/interfaces/itext.generation.provider.factory";
import { ITranscriptionProvider } from "../../domain/interfaces/itranscription.provider";
import { IVideoSource } from "../../domain/interfaces/ivideo.source";
import { KeyframeSelector } from "../services/keyframe.selector";
import { OutlineGenerator } from "../services/outline.generator";
import { SubtitleOptimizer } from "../services/subtitle.optimizer";
import { SubtitleProcessor } from "../services/subtitle.processor";
import { AiOutlineStep } from "../steps/ai-outline.step";
import { AiTranscriptionStep } from "../steps/ai-transcription.step";
import { DownloadVideoStep } from "../steps/download-video.step";
import { FetchSubtitlesStep } from "../steps/fetch-subtitles.step";
import { FinalizeStep } from "../steps/finalize.step";
import { FrameCaptureStep } from "../steps/frame-capture.step";
import { FrameOptimizeStep } from "../steps/frame-optimize.step";
import { KeyframeSelectionStep } from "../steps/keyframe-selection.step";
import { MetadataStep } from "../steps/metadata.step";
import { PrepareStep } from "../steps/prepare.step";
import { SubtitleOptimizeStep } from "../steps/subtitle-optimize.step";
import { SubtitleParseStep } from "../steps/subtitle-parse.step";
import { TranslateStep } from "../steps/translate.step";
import { ISlideProcessingStep } from "./slide.processing.step";

export interface SlideProcessingCollaborators {
  videoSource: IVideoSource;
  subtitleSource: ISubtitleSource;
  frameCapture: IFrameCapture;
  transcriptionProvider: ITranscriptionProvider;
  providerFactory: ITextGenerationProviderFactory;
  machineTranslator: IMachineTranslator;
  storage: IArtifactStorage;
}

export interface SlideProcessingTimeouts {
  providerTimeoutMs: number;
  fetchTimeoutMs: number;
  frameCaptureTimeoutMs: number;
  translationMaxRetries: number;
  translationConcurrency: number;
}

/** The steps in state-machine order; conditional ones decide for themselves whether to run. */
export function createSlideProcessingSteps(
  deps: SlideProcessingCollaborators,
  options: SlideProcessingTimeouts
): ISlideProcessingStep[] {
  const processor = new SubtitleProcessor();

  return [
    new PrepareStep(deps.providerFactory),
    new MetadataStep(deps.videoSource, options.fetchTimeoutMs),
    new DownloadVideoStep(deps.videoSource, options.fetchTimeoutMs),
    new FetchSubtitlesStep(deps.subtitleSource, options.fetchTimeoutMs),
    new AiTranscriptionStep(deps.transcriptionProvider, processor, options.providerTimeoutMs),
    new SubtitleOptimizeStep(processor, new SubtitleOptimizer()),
    new SubtitleParseStep(processor, deps.storage),
    new KeyframeSelectionStep(new KeyframeSelector()),
    new TranslateStep(deps.providerFactory, deps.machineTranslator, processor, deps.storage, {
      concurrency: options.translationConcurrency,
      maxRetries: options.translationMaxRetries,
      timeoutMs: options.providerTimeoutMs,
    }),
    new FrameCaptureStep(deps.frameCapture, deps.storage, options.frameCaptureTimeoutMs),
    new FrameOptimizeStep(deps.frameCapture, deps.storage, options.frameCaptureTimeoutMs),
    new AiOutlineStep(deps.providerFactory, new OutlineGenerator(options.providerTimeoutMs)),
    new FinalizeStep(deps.storage),
  ];
}
