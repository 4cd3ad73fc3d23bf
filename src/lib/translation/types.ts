export type TranslationItemResult = { ok: true; text: string } | { ok: false; reason: string };

export interface TranslateOptions {
  sourceLanguage: string;
  targetLanguage: string;
  signal?: AbortSignal;
}

/**
 * Black-box text translator. Results are positional: one per input text,
 * in the same order. A call may fail as a whole by throwing.
 */
export interface TranslationService {
  translate(texts: string[], options: TranslateOptions): Promise<TranslationItemResult[]>;
}

/** Network failure, rate limit or 5xx. Worth one more attempt. */
export class TransientTranslationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientTranslationError";
  }
}
