import { AiProvider, AiProviders } from "../../domain/enums/ai-provider";
import { ITextGenerationProvider } from "../../domain/interfaces/itext.generation.provider";
import { AiProviderStatus, ITextGenerationProviderFactory } from "../../domain/interfaces/itext.generation.provider.factory";
import { GeminiTextProvider } from "../gemini/gemini.text.provider";
import { OpenAICompatibleTextProvider } from "../openai/openai.text.provider";

export interface TextGenerationProvidersConfig {
  openaiApiKey?: string;
  openaiModel: string;
  anthropicApiKey?: string;
  claudeModel: string;
  geminiApiKey?: string;
  geminiModel: string;
  ollamaBaseUrl: string;
  ollamaModel: string;
}

const ANTHROPIC_OPENAI_BASE_URL = "https://api.anthropic.com/v1/";

/** Builds each provider once; request-level API keys are applied per call. */
export class TextGenerationProviderFactory implements ITextGenerationProviderFactory {
  private providers: Record<AiProvider, ITextGenerationProvider>;

  constructor(private readonly config: TextGenerationProvidersConfig) {
    this.providers = {
      openai: new OpenAICompatibleTextProvider({
        name: "openai",
        defaultModel: config.openaiModel,
        apiKey: config.openaiApiKey,
      }),
      claude: new OpenAICompatibleTextProvider({
        name: "claude",
        defaultModel: config.claudeModel,
        apiKey: config.anthropicApiKey,
        baseURL: ANTHROPIC_OPENAI_BASE_URL,
      }),
      gemini: new GeminiTextProvider(config.geminiModel, config.geminiApiKey),
      ollama: new OpenAICompatibleTextProvider({
        name: "ollama",
        defaultModel: config.ollamaModel,
        baseURL: `${config.ollamaBaseUrl}/v1`,
        requiresApiKey: false,
      }),
    };
  }

  create(name: AiProvider): ITextGenerationProvider {
    return this.providers[name];
  }

  isConfigured(name: AiProvider): boolean {
    switch (name) {
      case "openai":
        return Boolean(this.config.openaiApiKey);
      case "claude":
        return Boolean(this.config.anthropicApiKey);
      case "gemini":
        return Boolean(this.config.geminiApiKey);
      case "ollama":
        return true;
    }
  }

  describe(): AiProviderStatus[] {
    return AiProviders.map((name) => ({
      name,
      defaultModel: this.providers[name].defaultModel,
      configured: this.isConfigured(name),
    }));
  }
}
