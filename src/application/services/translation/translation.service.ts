import { ReconciliationEvent } from "../../../domain/entities/pipeline-result";
import { TranslationEngine } from "../../../domain/enums/translation-engine";

export interface TranslationRequest {
  sourceLang: string;
  targetLang: string;
  model?: string;
  apiKey?: string;
  /** Checked before each unit of work is dispatched. */
  isCancelled?: () => Promise<boolean>;
  onProgress?: (completed: number, total: number) => void;
}

export interface TranslationOutcome {
  translations: string[]; // same length and order as the input
  events: ReconciliationEvent[];
  batchSize: number;
  batchCount: number;
  failedBatches: number;
  cancelled: boolean;
}

export interface ITranslationService {
  readonly engine: TranslationEngine;
  translate(texts: string[], request: TranslationRequest): Promise<TranslationOutcome>;
}
