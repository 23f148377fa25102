import { GoogleGenAI } from "@google/genai";
import { ProviderCallError } from "../../domain/errors/pipeline.errors";
import { ITextGenerationProvider, TextGenerationConfig } from "../../domain/interfaces/itext.generation.provider";

export class GeminiTextProvider implements ITextGenerationProvider {
  readonly name = "gemini" as const;
  private ai?: GoogleGenAI;

  constructor(
    readonly defaultModel: string,
    apiKey?: string
  ) {
    if (apiKey) {
      this.ai = new GoogleGenAI({ apiKey });
    }
  }

  async complete(prompt: string, config: TextGenerationConfig = {}): Promise<string> {
    const ai = config.apiKey ? new GoogleGenAI({ apiKey: config.apiKey }) : this.ai;
    if (!ai) {
      throw new ProviderCallError("No API key configured for gemini");
    }

    let text: string | undefined;
    try {
      const response = await ai.models.generateContent({
        model: config.model || this.defaultModel,
        contents: prompt,
        config: {
          systemInstruction: config.systemPrompt,
          temperature: config.temperature,
          maxOutputTokens: config.maxTokens,
          abortSignal: config.signal,
        },
      });
      text = response.text;
    } catch (error) {
      throw new ProviderCallError("gemini request failed", { cause: error });
    }

    if (!text || !text.trim()) {
      throw new ProviderCallError("gemini returned no text");
    }
    return text;
  }
}
