import { AiProvider } from "../../domain/enums/ai-provider";
import { errorMessage } from "../../domain/errors/pipeline.errors";
import { ITextGenerationProvider } from "../../domain/interfaces/itext.generation.provider";
import { languageName } from "../../domain/utils/language-names";
import { withTimeout } from "./concurrency";

export interface OutlineInput {
  title: string;
  description?: string;
  cueTexts: string[];
  outputLanguage: string;
}

export interface OutlineOutcome {
  provider: AiProvider;
  model: string;
  outline?: string;
  error?: string;
}

const SAMPLE_THRESHOLD = 300;
const SAMPLE_SIZE = 100;
const DESCRIPTION_LIMIT = 500;
export const OMISSION_MARKER = "[...]";

/** Long transcripts are sampled from the beginning, middle and end. */
export function sampleCueTexts(texts: string[]): string[] {
  if (texts.length <= SAMPLE_THRESHOLD) {
    return texts;
  }
  const middleStart = Math.floor(texts.length / 2) - SAMPLE_SIZE / 2;
  return [
    ...texts.slice(0, SAMPLE_SIZE),
    OMISSION_MARKER,
    ...texts.slice(middleStart, middleStart + SAMPLE_SIZE),
    OMISSION_MARKER,
    ...texts.slice(-SAMPLE_SIZE),
  ];
}

export function buildOutlinePrompt(input: OutlineInput): string {
  const description = input.description ? input.description.slice(0, DESCRIPTION_LIMIT) : "";
  const transcript = sampleCueTexts(input.cueTexts).join("\n");

  return `Write a structured outline of the video below in ${languageName(input.outputLanguage)}.

Title: ${input.title}
${description ? `Description: ${description}\n` : ""}
Transcript:
${transcript}

Format the outline in Markdown:
## Overview
A two or three sentence summary.

## Key Points
Numbered sections, each with a short heading and two to four bullet points.

## Takeaways
Three to five bullet points.`;
}

/**
 * Single-call outline generation. Failures come back on the outcome instead
 * of being thrown; the deck is complete without an outline.
 */
export class OutlineGenerator {
  constructor(private readonly timeoutMs: number) {}

  async generate(
    provider: ITextGenerationProvider,
    input: OutlineInput,
    options: { model?: string; apiKey?: string } = {}
  ): Promise<OutlineOutcome> {
    const model = options.model || provider.defaultModel;
    try {
      const outline = await withTimeout(
        (signal) =>
          provider.complete(buildOutlinePrompt(input), {
            model,
            apiKey: options.apiKey,
            systemPrompt: "You summarize video transcripts into clear, well-structured outlines.",
            temperature: 0.7,
            maxTokens: 2000,
            signal,
          }),
        this.timeoutMs,
        "Outline generation"
      );
      if (!outline.trim()) {
        return { provider: provider.name, model, error: "Provider returned an empty outline" };
      }
      return { provider: provider.name, model, outline: outline.trim() };
    } catch (error) {
      console.warn(`[OutlineGenerator] Outline generation via ${provider.name} failed: ${errorMessage(error)}`);
      return { provider: provider.name, model, error: errorMessage(error) };
    }
  }
}
