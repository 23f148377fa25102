import { AiProvider } from "../enums/ai-provider";

export interface TextGenerationConfig {
  model?: string;
  apiKey?: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface ITextGenerationProvider {
  readonly name: AiProvider;
  readonly defaultModel: string;
  complete(prompt: string, config?: TextGenerationConfig): Promise<string>;
}
