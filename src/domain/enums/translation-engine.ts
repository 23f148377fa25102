export const TranslationEngines = ["ai", "machine"] as const;

// "ai" = batched text-generation provider, "machine" = non-AI web translator
export type TranslationEngine = typeof TranslationEngines[number];

export function isTranslationEngine(value: unknown): value is TranslationEngine {
  return typeof value === "string" && (TranslationEngines as readonly string[]).includes(value);
}
