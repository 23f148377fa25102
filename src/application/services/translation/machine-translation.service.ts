import { ReconciliationEvent } from "../../../domain/entities/pipeline-result";
import { errorMessage } from "../../../domain/errors/pipeline.errors";
import { IMachineTranslator } from "../../../domain/interfaces/imachine.translator";
import { runWithConcurrency, withTimeout } from "../concurrency";
import { ITranslationService, TranslationOutcome, TranslationRequest } from "./translation.service";

export interface MachineTranslationOptions {
  concurrency: number;
  timeoutMs: number;
}

/**
 * Cue-by-cue translation through a machine translator. Each cue is its own
 * unit: a failed cue keeps its source text.
 */
export class MachineTranslationService implements ITranslationService {
  readonly engine = "machine" as const;

  constructor(
    private readonly translator: IMachineTranslator,
    private readonly options: MachineTranslationOptions
  ) {}

  async translate(texts: string[], request: TranslationRequest): Promise<TranslationOutcome> {
    console.log(`[MachineTranslationService] Translating ${texts.length} cues ${request.sourceLang} -> ${request.targetLang}`);

    let cancelled = false;
    const events: ReconciliationEvent[] = [];

    const tasks = texts.map((text, i) => async (): Promise<string> => {
      if (!text.trim()) {
        return text;
      }
      if (cancelled || (request.isCancelled && (await request.isCancelled()))) {
        cancelled = true;
        return text;
      }
      try {
        return await withTimeout(
          (signal) => this.translator.translate(text, request.sourceLang, request.targetLang, { signal }),
          this.options.timeoutMs,
          `Machine translation of cue ${i}`
        );
      } catch (error) {
        events.push({ kind: "passthrough", batchIndex: i, cueIndex: i, reason: errorMessage(error) });
        return text;
      }
    });

    const translations = await runWithConcurrency(tasks, this.options.concurrency, request.onProgress);
    events.sort((a, b) => a.cueIndex - b.cueIndex);

    if (events.length > 0) {
      console.warn(`[MachineTranslationService] ${events.length} cue(s) kept their source text`);
    }

    return {
      translations,
      events,
      batchSize: 1,
      batchCount: texts.length,
      failedBatches: events.length,
      cancelled,
    };
  }
}
