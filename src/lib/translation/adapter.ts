import { config } from "../config";
import { errorMessage } from "../errors";
import { NormalizationTables, getDefaultTables, normalizeLabel } from "../normalization-maps";
import { raceAbort } from "../scraping/utils";
import {
  Confidence,
  ExtractionError,
  ExtractionErrorKind,
  NormalizedField,
  TranslatedField,
} from "../types";
import { TranslationCache } from "./cache";
import {
  TranslateOptions,
  TranslationItemResult,
  TranslationService,
  TransientTranslationError,
} from "./types";

export interface TranslateFieldsOptions {
  service: TranslationService | null;
  cache?: TranslationCache | null;
  tables?: NormalizationTables;
  sourceLanguage?: string;
  targetLanguage?: string;
  batchSize?: number;
  signal?: AbortSignal;
}

// Either already resolved locally, or waiting on the service for `source`
type Part = { text: string } | { source: string };

interface Outcome {
  text?: string;
  reason?: string;
}

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(6)));
}

function planLabel(field: NormalizedField, tables: NormalizationTables, target: string): Part {
  const display = tables.labels.entries.get(normalizeLabel(field.label))?.display[target];
  if (display) return { text: display };
  // Missing fields never reach the service
  return field.confidence === Confidence.MISSING ? { text: field.label } : { source: field.label };
}

function planValue(field: NormalizedField, tables: NormalizationTables, target: string): Part {
  const { vocabulary } = tables;
  if (field.confidence === Confidence.MISSING) return { text: field.raw };

  const value = field.value;
  switch (value.kind) {
    case "number": {
      if (!field.unit) return { text: formatNumber(value.value) };
      const unit = vocabulary.units.get(field.unit)?.display[target] ?? field.unit;
      return { text: `${formatNumber(value.value)} ${unit}` };
    }
    case "boolean": {
      const display = vocabulary.booleanDisplay[value.value ? "true" : "false"][target];
      return display ? { text: display } : { source: field.raw };
    }
    case "option": {
      const display = vocabulary.optionDisplay.get(value.value)?.[target];
      return display ? { text: display } : { source: field.raw };
    }
    case "text":
      return value.value ? { source: value.value } : { text: field.raw };
  }
}

async function translateWithRetry(
  service: TranslationService,
  texts: string[],
  options: TranslateOptions
): Promise<TranslationItemResult[]> {
  const attempt = async () => {
    const results = await raceAbort(service.translate(texts, options), options.signal);
    if (results.length !== texts.length) {
      throw new Error(`Translation service returned ${results.length} results for ${texts.length} texts`);
    }
    return results;
  };

  try {
    return await attempt();
  } catch (error) {
    if (!(error instanceof TransientTranslationError) || options.signal?.aborted) throw error;
    console.warn(`[translate] Transient failure, retrying once: ${error.message}`);
    return attempt();
  }
}

/**
 * Resolve every pending source string: cache first, then the service in
 * batches. Never throws; failures come back as outcomes with a reason.
 */
async function resolvePending(
  pending: string[],
  options: Required<Pick<TranslateFieldsOptions, "sourceLanguage" | "targetLanguage" | "batchSize">> &
    Pick<TranslateFieldsOptions, "cache" | "signal"> & { service: TranslationService }
): Promise<Map<string, Outcome>> {
  const { service, cache, sourceLanguage, targetLanguage, batchSize, signal } = options;
  const outcomes = new Map<string, Outcome>();

  const cached = cache ? cache.getMany(pending, sourceLanguage, targetLanguage) : new Map<string, string>();
  for (const [source, text] of cached) outcomes.set(source, { text });
  if (cached.size > 0) console.log(`[translate] ${cached.size}/${pending.length} strings from cache`);

  const misses = pending.filter((source) => !cached.has(source));
  for (let i = 0; i < misses.length; i += batchSize) {
    if (signal?.aborted) {
      const reason = errorMessage(signal.reason);
      console.warn(`[translate] Aborted with ${misses.length - i} strings left: ${reason}`);
      for (const source of misses.slice(i)) outcomes.set(source, { reason });
      break;
    }
    const batch = misses.slice(i, i + batchSize);
    const fresh: [string, string][] = [];
    try {
      const results = await translateWithRetry(service, batch, { sourceLanguage, targetLanguage, signal });
      batch.forEach((source, index) => {
        const result = results[index];
        if (result.ok) {
          outcomes.set(source, { text: result.text });
          fresh.push([source, result.text]);
        } else {
          outcomes.set(source, { reason: result.reason });
        }
      });
    } catch (error) {
      const reason = errorMessage(error);
      console.warn(`[translate] Batch of ${batch.length} failed: ${reason}`);
      for (const source of batch) outcomes.set(source, { reason });
    }
    if (cache && fresh.length > 0) cache.setMany(fresh, sourceLanguage, targetLanguage);
  }

  return outcomes;
}

/**
 * Translate labels and values into the target language. Vocabulary and
 * label-table display names are used where they exist; everything else goes
 * through the service. Failures keep the original text and add one
 * translation_failure per affected field.
 */
export async function translateFields(
  fields: NormalizedField[],
  options: TranslateFieldsOptions
): Promise<{ fields: TranslatedField[]; errors: ExtractionError[] }> {
  const {
    service,
    cache = null,
    tables = getDefaultTables(),
    sourceLanguage = config.sourceLanguage,
    targetLanguage = config.targetLanguage,
    batchSize = config.translationBatchSize,
    signal,
  } = options;

  // Nothing to translate into the page's own language
  if (targetLanguage === sourceLanguage) {
    return {
      fields: fields.map((f) => ({ ...f, translatedLabel: f.label, translatedValue: f.raw })),
      errors: [],
    };
  }

  const plans = fields.map((field) => ({
    field,
    label: planLabel(field, tables, targetLanguage),
    value: planValue(field, tables, targetLanguage),
  }));

  const pending = new Set<string>();
  for (const plan of plans) {
    if ("source" in plan.label) pending.add(plan.label.source);
    if ("source" in plan.value) pending.add(plan.value.source);
  }

  const errors: ExtractionError[] = [];
  let outcomes = new Map<string, Outcome>();

  if (pending.size > 0 && !service) {
    errors.push({
      field: "*",
      reason: `No translation service configured; ${pending.size} strings left in ${sourceLanguage}`,
      kind: ExtractionErrorKind.TRANSLATION_FAILURE,
    });
  } else if (pending.size > 0 && service) {
    console.log(`[translate] ${pending.size} unique strings for ${fields.length} fields → ${targetLanguage}`);
    outcomes = await resolvePending([...pending], {
      service,
      cache,
      sourceLanguage,
      targetLanguage,
      batchSize: Math.max(1, batchSize),
      signal,
    });
  }

  const translated = plans.map(({ field, label, value }): TranslatedField => {
    const reasons: string[] = [];
    const resolve = (part: Part, what: string): string => {
      if ("text" in part) return part.text;
      const outcome = outcomes.get(part.source);
      if (outcome?.text !== undefined) return outcome.text;
      if (service && outcome?.reason) reasons.push(`${what}: ${outcome.reason}`);
      return part.source;
    };

    const translatedLabel = resolve(label, "label");
    const translatedValue = resolve(value, "value");
    if (reasons.length > 0) {
      errors.push({
        field: field.canonicalKey,
        reason: `Translation failed (${reasons.join("; ")})`,
        kind: ExtractionErrorKind.TRANSLATION_FAILURE,
      });
    }
    return { ...field, translatedLabel, translatedValue };
  });

  return { fields: translated, errors };
}
