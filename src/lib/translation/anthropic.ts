import Anthropic from "@anthropic-ai/sdk";
import { config } from "../config";
import { errorMessage } from "../errors";
import {
  TranslateOptions,
  TranslationItemResult,
  TranslationService,
  TransientTranslationError,
} from "./types";

const LANGUAGE_NAMES: Record<string, string> = {
  zh: "Chinese",
  ru: "Russian",
  en: "English",
};

const REPORT_TRANSLATIONS_TOOL: Anthropic.Tool = {
  name: "report_translations",
  description:
    "Report the translations, one per input string and in the same order. Use null for a string you cannot translate.",
  input_schema: {
    type: "object" as const,
    properties: {
      translations: {
        type: "array",
        items: { type: ["string", "null"] },
        description: "Translated strings, positionally matching the input list.",
      },
    },
    required: ["translations"],
  },
};

function languageName(code: string): string {
  return LANGUAGE_NAMES[code] ?? code;
}

function isTransient(error: unknown): boolean {
  if (error instanceof Anthropic.APIConnectionError) return true;
  if (error instanceof Anthropic.APIError && error.status !== undefined) {
    return error.status === 429 || error.status >= 500;
  }
  return false;
}

function readTranslations(input: unknown): unknown[] | null {
  if (typeof input !== "object" || input === null || !("translations" in input)) return null;
  const { translations } = input;
  return Array.isArray(translations) ? translations : null;
}

export interface AnthropicTranslationOptions {
  apiKey: string;
  model?: string;
  client?: Anthropic;
}

/**
 * Translates short automotive strings (spec labels, option values) with a
 * forced tool call so the reply is a positional list.
 */
export class AnthropicTranslationService implements TranslationService {
  private readonly client: Anthropic;
  private readonly model: string;

  constructor(options: AnthropicTranslationOptions) {
    // Retries are the adapter's job
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
    this.model = options.model ?? config.translationModel;
  }

  async translate(texts: string[], options: TranslateOptions): Promise<TranslationItemResult[]> {
    if (texts.length === 0) return [];

    const prompt =
      `Translate each string in this JSON list from ${languageName(options.sourceLanguage)} ` +
      `to ${languageName(options.targetLanguage)}. They are labels and values from a car ` +
      `specification sheet; keep numbers, units and model codes as they are. ` +
      `Report with the report_translations tool.\n\n${JSON.stringify(texts)}`;

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: 4096,
          tools: [REPORT_TRANSLATIONS_TOOL],
          tool_choice: { type: "tool", name: REPORT_TRANSLATIONS_TOOL.name },
          messages: [{ role: "user", content: prompt }],
        },
        { signal: options.signal }
      );
    } catch (error) {
      if (isTransient(error)) {
        throw new TransientTranslationError(errorMessage(error), { cause: error });
      }
      throw error;
    }

    for (const block of response.content) {
      if (block.type !== "tool_use" || block.name !== REPORT_TRANSLATIONS_TOOL.name) continue;

      const translations = readTranslations(block.input);
      if (!translations) {
        throw new Error("report_translations call without a translations list");
      }
      if (translations.length !== texts.length) {
        throw new Error(`Expected ${texts.length} translations, got ${translations.length}`);
      }
      return translations.map((item): TranslationItemResult =>
        typeof item === "string" && item.trim()
          ? { ok: true, text: item.trim() }
          : { ok: false, reason: "No translation returned" }
      );
    }

    throw new Error("No report_translations call in response");
  }
}

/** Built-in service, or null when no API key is configured. */
export function createTranslationService(
  apiKey: string = config.anthropicApiKey,
  model: string = config.translationModel
): TranslationService | null {
  if (!apiKey) {
    console.log("[translate] No API key, translation disabled");
    return null;
  }
  return new AnthropicTranslationService({ apiKey, model });
}
