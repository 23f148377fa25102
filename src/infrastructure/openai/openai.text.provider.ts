import OpenAI from "openai";
import { AiProvider } from "../../domain/enums/ai-provider";
import { ProviderCallError } from "../../domain/errors/pipeline.errors";
import { ITextGenerationProvider, TextGenerationConfig } from "../../domain/interfaces/itext.generation.provider";

export interface OpenAICompatibleProviderConfig {
  name: AiProvider;
  defaultModel: string;
  apiKey?: string;
  baseURL?: string; // Anthropic and Ollama expose OpenAI-compatible endpoints
  requiresApiKey?: boolean; // Default: true
}

/**
 * Chat-completions provider for OpenAI and OpenAI-compatible APIs.
 */
export class OpenAICompatibleTextProvider implements ITextGenerationProvider {
  readonly name: AiProvider;
  readonly defaultModel: string;
  private client?: OpenAI;

  constructor(private readonly config: OpenAICompatibleProviderConfig) {
    this.name = config.name;
    this.defaultModel = config.defaultModel;
    const apiKey = this.resolveKey(config.apiKey);
    if (apiKey) {
      this.client = new OpenAI({ apiKey, baseURL: config.baseURL });
    }
  }

  private resolveKey(apiKey?: string): string | undefined {
    if (apiKey) return apiKey;
    // Local servers ignore the key but the SDK insists on one
    return this.config.requiresApiKey === false ? "unused" : undefined;
  }

  async complete(prompt: string, config: TextGenerationConfig = {}): Promise<string> {
    const client = config.apiKey ? new OpenAI({ apiKey: config.apiKey, baseURL: this.config.baseURL }) : this.client;
    if (!client) {
      throw new ProviderCallError(`No API key configured for ${this.name}`);
    }

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (config.systemPrompt) {
      messages.push({ role: "system", content: config.systemPrompt });
    }
    messages.push({ role: "user", content: prompt });

    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await client.chat.completions.create(
        {
          model: config.model || this.defaultModel,
          messages,
          temperature: config.temperature,
          max_tokens: config.maxTokens,
        },
        { signal: config.signal, maxRetries: 0 }
      );
    } catch (error) {
      throw new ProviderCallError(`${this.name} request failed`, { cause: error });
    }

    const content = completion.choices[0]?.message?.content;
    if (typeof content !== "string" || !content.trim()) {
      throw new ProviderCallError(`${this.name} returned no text`);
    }
    return content;
  }
}
