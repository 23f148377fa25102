import { AiProvider } from "../enums/ai-provider";
import { ITextGenerationProvider } from "./itext.generation.provider";

export interface AiProviderStatus {
  name: AiProvider;
  defaultModel: string;
  configured: boolean;
}

export interface ITextGenerationProviderFactory {
  create(name: AiProvider): ITextGenerationProvider;
  /** A server-side credential exists (or none is needed). */
  isConfigured(name: AiProvider): boolean;
  describe(): AiProviderStatus[];
}
