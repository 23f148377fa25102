import { PipelineError } from "../../domain/errors/pipeline.errors";
import { IArtifactStorage } from "../../domain/interfaces/iartifact.storage";
import { IMachineTranslator } from "../../domain/interfaces/imachine.translator";
import { ITextGenerationProviderFactory } from "../../domain/interfaces/itext.generation.provider.factory";
import { SubtitleProcessor } from "../services/subtitle.processor";
import { BatchTranslationEngine } from "../services/translation/batch-translation.engine";
import { MachineTranslationService } from "../services/translation/machine-translation.service";
import { ITranslationService } from "../services/translation/translation.service";
import { SlideProcessingContext } from "../pipeline/slide.processing.context";
import { ISlideProcessingStep, StepReporter } from "../pipeline/slide.processing.step";

export interface TranslateStepOptions {
  concurrency: number;
  maxRetries: number;
  timeoutMs: number;
}

export class TranslateStep implements ISlideProcessingStep {
  readonly name = "translate" as const;
  readonly description = "Translating subtitles";

  constructor(
    private readonly providerFactory: ITextGenerationProviderFactory,
    private readonly machineTranslator: IMachineTranslator,
    private readonly processor: SubtitleProcessor,
    private readonly storage: IArtifactStorage,
    private readonly options: TranslateStepOptions
  ) {}

  shouldRun(context: SlideProcessingContext): boolean {
    const target = context.request.translateTo;
    return Boolean(target) && target !== context.subtitleTrack?.language;
  }

  async execute(context: SlideProcessingContext, reporter: StepReporter): Promise<SlideProcessingContext> {
    const { cues, subtitleTrack, request } = context;
    const targetLang = request.translateTo;
    if (!cues || !subtitleTrack || !targetLang) {
      throw new PipelineError("Translation requested before subtitles were parsed");
    }

    const service = this.createService(context);
    let progressChain: Promise<void> = Promise.resolve();

    const outcome = await service.translate(
      cues.map((cue) => cue.sourceText),
      {
        sourceLang: subtitleTrack.language,
        targetLang,
        model: request.aiModel,
        apiKey: request.apiKey,
        isCancelled: () => reporter.isCancelled(),
        onProgress: (completed, total) => {
          progressChain = progressChain.then(() =>
            reporter.progress(completed / total, `Translated ${completed}/${total} ${service.engine === "ai" ? "batches" : "cues"}`)
          );
        },
      }
    );
    await progressChain;

    // Results of batches still in flight at cancellation are discarded here
    if (outcome.cancelled) {
      await reporter.throwIfCancelled();
    }

    const translated = cues.map((cue, i) => ({ ...cue, translatedText: outcome.translations[i] }));
    const warnings = [...context.warnings];
    if (outcome.failedBatches > 0) {
      warnings.push({
        step: this.name,
        message: `${outcome.failedBatches}/${outcome.batchCount} translation unit(s) left untranslated`,
      });
    }

    const translatedSubtitleArtifact = `subtitles.${targetLang}.translated.srt`;
    await this.storage.put(
      context.jobId,
      translatedSubtitleArtifact,
      Buffer.from(this.processor.serialize(translated, true), "utf-8"),
      "application/x-subrip"
    );

    console.log(
      `[TranslateStep] Translated ${cues.length} cues to ${targetLang} via ${service.engine} (${outcome.events.length} reconciliation event(s))`
    );
    return {
      ...context,
      cues: translated,
      translatedTo: targetLang,
      translatedSubtitleArtifact,
      reconciliationEvents: [...context.reconciliationEvents, ...outcome.events],
      warnings,
    };
  }

  private createService(context: SlideProcessingContext): ITranslationService {
    const { aiProvider } = context.request;
    if (context.translationEngine === "ai" && aiProvider) {
      return new BatchTranslationEngine(this.providerFactory.create(aiProvider), {
        concurrency: this.options.concurrency,
        maxRetries: this.options.maxRetries,
        timeoutMs: this.options.timeoutMs,
      });
    }
    return new MachineTranslationService(this.machineTranslator, {
      concurrency: this.options.concurrency,
      timeoutMs: this.options.timeoutMs,
    });
  }
}
