export interface IMachineTranslator {
  /**
   * Translates one text. Implementations reject on failure; callers decide
   * what a failed cue falls back to.
   */
  translate(
    text: string,
    sourceLang: string,
    targetLang: string,
    options?: { signal?: AbortSignal }
  ): Promise<string>;
}
