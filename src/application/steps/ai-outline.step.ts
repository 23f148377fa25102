import { PipelineError } from "../../domain/errors/pipeline.errors";
import { ITextGenerationProviderFactory } from "../../domain/interfaces/itext.generation.provider.factory";
import { OutlineGenerator } from "../services/outline.generator";
import { SlideProcessingContext } from "../pipeline/slide.processing.context";
import { ISlideProcessingStep } from "../pipeline/slide.processing.step";

export class AiOutlineStep implements ISlideProcessingStep {
  readonly name = "ai_outline" as const;
  readonly description = "Generating outline";

  constructor(
    private readonly providerFactory: ITextGenerationProviderFactory,
    private readonly generator: OutlineGenerator
  ) {}

  shouldRun(context: SlideProcessingContext): boolean {
    return context.request.generateOutline && context.request.aiProvider !== undefined;
  }

  async execute(context: SlideProcessingContext): Promise<SlideProcessingContext> {
    const { request, cues, metadata } = context;
    if (!cues || !request.aiProvider) {
      throw new PipelineError("Outline requested before subtitles were parsed");
    }

    const outcome = await this.generator.generate(
      this.providerFactory.create(request.aiProvider),
      {
        title: metadata?.title ?? "Untitled video",
        description: metadata?.description,
        cueTexts: cues.map((cue) => cue.translatedText ?? cue.sourceText),
        outputLanguage: context.translatedTo ?? context.subtitleTrack?.language ?? "en",
      },
      { model: request.aiModel, apiKey: request.apiKey }
    );

    if (!outcome.outline) {
      return {
        ...context,
        warnings: [...context.warnings, { step: this.name, message: `Outline unavailable: ${outcome.error ?? "unknown error"}` }],
      };
    }
    return { ...context, outline: outcome.outline, outlineProvider: `${outcome.provider}/${outcome.model}` };
  }
}
