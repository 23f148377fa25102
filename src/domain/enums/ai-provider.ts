export const AiProviders = ["openai", "claude", "gemini", "ollama"] as const;

export type AiProvider = typeof AiProviders[number];

export function isAiProvider(value: unknown): value is AiProvider {
  return typeof value === "string" && (AiProviders as readonly string[]).includes(value);
}
