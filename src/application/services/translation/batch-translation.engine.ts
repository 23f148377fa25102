import { ReconciliationEvent } from "../../../domain/entities/pipeline-result";
import { errorMessage, ProviderCallError, TranslationMismatchError } from "../../../domain/errors/pipeline.errors";
import { ITextGenerationProvider } from "../../../domain/interfaces/itext.generation.provider";
import { languageName } from "../../../domain/utils/language-names";
import { runWithConcurrency, withTimeout } from "../concurrency";
import { ITranslationService, TranslationOutcome, TranslationRequest } from "./translation.service";
import { DEFAULT_PARSE_STRATEGIES, reconcileResponse, TranslationParseStrategy } from "./translation-response.parser";

export interface BatchTranslationOptions {
  maxRetries: number; // attempts after the first
  concurrency: number;
  timeoutMs: number;
  strategies?: readonly TranslationParseStrategy[];
}

export interface TranslationBatch {
  batchIndex: number;
  cueIndices: number[]; // positions in the full text list
  texts: string[];
}

interface BatchResult {
  translations: string[];
  events: ReconciliationEvent[];
  failed: boolean;
}

const SYSTEM_PROMPT =
  "You are a professional subtitle translator. You keep every numbered line, translate naturally and never add commentary.";

/** Shorter cues fit more per request. */
export function computeBatchSize(texts: string[]): number {
  if (texts.length === 0) {
    return 30;
  }
  const average = texts.reduce((sum, text) => sum + Array.from(text).length, 0) / texts.length;
  if (average < 30) return 30;
  if (average < 60) return 20;
  if (average < 100) return 15;
  return 10;
}

export function buildBatches(texts: string[], batchSize: number): TranslationBatch[] {
  const batches: TranslationBatch[] = [];
  for (let start = 0; start < texts.length; start += batchSize) {
    const slice = texts.slice(start, start + batchSize);
    batches.push({
      batchIndex: batches.length,
      cueIndices: slice.map((_, i) => start + i),
      texts: slice,
    });
  }
  return batches;
}

export function buildTranslationPrompt(texts: string[], sourceLang: string, targetLang: string): string {
  const lines = texts.map((text, i) => `[${i}] ${text.replace(/\s*\n\s*/g, " ")}`).join("\n");
  return `Translate all ${texts.length} subtitle lines below from ${languageName(sourceLang)} to ${languageName(targetLang)}.

Rules:
- Return exactly ${texts.length} lines, numbered [0] to [${texts.length - 1}].
- Each line is "[number] translation", one line per subtitle, in the same order.
- Keep each translation short enough to read on screen (about 42 characters).
- Keep names and technical terms consistent across lines.
- Output the numbered lines only.

${lines}`;
}

/**
 * Translates cue texts in indexed batches through a text-generation provider.
 * Batches run with bounded concurrency and are reassembled by index; a batch
 * that keeps failing is passed through untranslated and reported.
 */
export class BatchTranslationEngine implements ITranslationService {
  readonly engine = "ai" as const;

  constructor(
    private readonly provider: ITextGenerationProvider,
    private readonly options: BatchTranslationOptions
  ) {}

  async translate(texts: string[], request: TranslationRequest): Promise<TranslationOutcome> {
    const batchSize = computeBatchSize(texts);
    const batches = buildBatches(texts, batchSize);
    console.log(
      `[BatchTranslationEngine] Translating ${texts.length} cues in ${batches.length} batch(es) of up to ${batchSize} via ${this.provider.name}`
    );

    let cancelled = false;
    const tasks = batches.map((batch) => async (): Promise<BatchResult | null> => {
      if (cancelled || (request.isCancelled && (await request.isCancelled()))) {
        cancelled = true;
        return null;
      }
      return this.translateBatch(batch, request);
    });

    const results = await runWithConcurrency(tasks, this.options.concurrency, request.onProgress);

    const translations = [...texts];
    const events: ReconciliationEvent[] = [];
    let failedBatches = 0;

    results.forEach((result, i) => {
      if (!result) return;
      batches[i].cueIndices.forEach((cueIndex, k) => {
        translations[cueIndex] = result.translations[k];
      });
      events.push(...result.events);
      if (result.failed) failedBatches++;
    });

    if (failedBatches > 0) {
      console.warn(`[BatchTranslationEngine] ${failedBatches}/${batches.length} batch(es) passed through untranslated`);
    }

    return { translations, events, batchSize, batchCount: batches.length, failedBatches, cancelled };
  }

  private async translateBatch(batch: TranslationBatch, request: TranslationRequest): Promise<BatchResult> {
    const prompt = buildTranslationPrompt(batch.texts, request.sourceLang, request.targetLang);
    const attempts = this.options.maxRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const response = await withTimeout(
          (signal) =>
            this.provider.complete(prompt, {
              model: request.model,
              apiKey: request.apiKey,
              systemPrompt: SYSTEM_PROMPT,
              temperature: 0.3,
              maxTokens: 4000,
              signal,
            }),
          this.options.timeoutMs,
          `Translation batch ${batch.batchIndex}`
        );
        if (!response.trim()) {
          throw new ProviderCallError(`Empty response for translation batch ${batch.batchIndex}`);
        }
        return this.reconcile(batch, response);
      } catch (error) {
        lastError = error;
        console.warn(
          `[BatchTranslationEngine] Batch ${batch.batchIndex} attempt ${attempt}/${attempts} failed: ${errorMessage(error)}`
        );
      }
    }

    const reason = errorMessage(lastError);
    return {
      translations: [...batch.texts],
      events: batch.cueIndices.map((cueIndex) => ({
        kind: "passthrough",
        batchIndex: batch.batchIndex,
        cueIndex,
        reason,
      })),
      failed: true,
    };
  }

  private reconcile(batch: TranslationBatch, response: string): BatchResult {
    const reconciled = reconcileResponse(response, batch.texts.length, this.options.strategies ?? DEFAULT_PARSE_STRATEGIES);
    const translations = batch.texts.map((source, k) => reconciled.translations[k] ?? source);

    if (reconciled.missing.length === 0) {
      return { translations, events: [], failed: false };
    }

    const mismatch = new TranslationMismatchError(
      batch.batchIndex,
      reconciled.missing.map((k) => batch.cueIndices[k]),
      batch.texts.length
    );
    console.warn(`[BatchTranslationEngine] ${mismatch.message} (strategy: ${reconciled.strategy})`);

    return {
      translations,
      events: mismatch.missingCueIndices.map((cueIndex) => ({
        kind: "backfill",
        batchIndex: batch.batchIndex,
        cueIndex,
        reason: mismatch.message,
      })),
      failed: false,
    };
  }
}
