import { AiProvider } from "../../domain/enums/ai-provider";
import { ITextGenerationProviderFactory } from "../../domain/interfaces/itext.generation.provider.factory";
import { SlideProcessingContext } from "../pipeline/slide.processing.context";
import { ISlideProcessingStep } from "../pipeline/slide.processing.step";

/**
 * Resolves request options that depend on server configuration, such as
 * which translation engine will run.
 */
export class PrepareStep implements ISlideProcessingStep {
  readonly name = "prepare" as const;
  readonly description = "Preparing job";

  constructor(private readonly providerFactory: ITextGenerationProviderFactory) {}

  async execute(context: SlideProcessingContext): Promise<SlideProcessingContext> {
    const { request } = context;
    const warnings = [...context.warnings];
    const providerUsable = (provider: AiProvider) =>
      Boolean(request.apiKey) || this.providerFactory.isConfigured(provider);

    let translationEngine = context.translationEngine;
    if (request.translateTo) {
      translationEngine = request.translationEngine ?? (request.aiProvider ? "ai" : "machine");
      if (translationEngine === "ai" && (!request.aiProvider || !providerUsable(request.aiProvider))) {
        const message = request.aiProvider
          ? `No credentials for ${request.aiProvider}, using machine translation`
          : "AI translation requested without a provider, using machine translation";
        console.warn(`[PrepareStep] Job ${context.jobId}: ${message}`);
        warnings.push({ step: this.name, message });
        translationEngine = "machine";
      }
    }

    if (request.generateOutline && !request.aiProvider) {
      const message = "Outline requested without an AI provider, it will be skipped";
      console.warn(`[PrepareStep] Job ${context.jobId}: ${message}`);
      warnings.push({ step: this.name, message });
    }

    console.log(
      `[PrepareStep] Job ${context.jobId}: quality=${request.quality}p, translateTo=${request.translateTo ?? "none"}, engine=${translationEngine ?? "none"}`
    );
    return { ...context, translationEngine, warnings };
  }
}
