import { assembleRecord } from "./assembler";
import { config } from "./config";
import { ParseCancelled, FetchTimeout, VehicleParseError, errorMessage } from "./errors";
import { extractPage, readySelectorFor } from "./extraction";
import { MARKETPLACE_SELECTORS } from "./extraction/selectors";
import { NormalizationTables, getDefaultTables, normalizeLabel } from "./normalization-maps";
import { normalizeFields } from "./normalization";
import { BrowserSession, FetchOptions, clickThrough, fetchRenderedPage } from "./scraping/browser";
import { createDeadline } from "./scraping/utils";
import { TranslationCache } from "./translation/cache";
import { translateFields } from "./translation/adapter";
import { TranslationService } from "./translation/types";
import {
  NormalizedField,
  ParseStage,
  ProgressEvent,
  RecordKind,
  VehicleRecord,
} from "./types";

export interface ParseOptions {
  /** Bounds fetching and translation. Defaults to PARSE_TIMEOUT_MS. */
  timeoutMs?: number;
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => void;
  /** Configuration records only: canonical keys to keep. */
  includeKeys?: string[];
  includeMissing?: boolean;
  targetLanguage?: string;
  trimIndex?: number;
  /** Click through the listing gallery so every image is in the DOM. */
  expandGallery?: boolean;
  service?: TranslationService | null;
  cache?: TranslationCache | null;
  tables?: NormalizationTables;
  fetch?: Pick<FetchOptions, "navigationTimeoutMs" | "readyTimeoutMs" | "settleDelayMs">;
}

function selectFields(
  fields: NormalizedField[],
  kind: RecordKind,
  tables: NormalizationTables,
  includeKeys?: string[]
): NormalizedField[] {
  if (kind !== RecordKind.CONFIGURATION) return fields;
  if (includeKeys) {
    const wanted = new Set(includeKeys);
    return fields.filter((field) => wanted.has(field.canonicalKey));
  }
  return fields.filter(
    (field) => tables.labels.entries.get(normalizeLabel(field.label))?.include !== false
  );
}

function toParseError(error: unknown, url: string, stage: ParseStage, timedOut: boolean, signal?: AbortSignal): VehicleParseError {
  if (error instanceof VehicleParseError) return error;
  if (timedOut) {
    return new FetchTimeout(`Parsing ${url} exceeded the request deadline`, { stage, url, cause: error });
  }
  if (signal?.aborted) {
    return new ParseCancelled(`Parsing ${url} was cancelled`, { stage, url, cause: error });
  }
  return new VehicleParseError(`Parsing ${url} failed while ${stage}: ${errorMessage(error)}`, {
    stage,
    url,
    diagnostic: errorMessage(error),
    cause: error,
  });
}

/**
 * Fetch, extract, normalize, translate and assemble one page. Progress is
 * reported per stage; a fatal error ends with a "failed" event and is thrown
 * as a VehicleParseError subclass.
 */
export async function parseVehiclePage(
  session: BrowserSession,
  url: string,
  recordKind: RecordKind,
  options: ParseOptions = {}
): Promise<VehicleRecord> {
  const {
    timeoutMs = config.parseTimeoutMs,
    signal,
    onProgress,
    includeKeys,
    includeMissing,
    targetLanguage = config.targetLanguage,
    trimIndex,
    expandGallery = true,
    service = null,
    cache = null,
    tables = getDefaultTables(),
  } = options;

  const deadline = createDeadline(timeoutMs, signal);
  let stage: ParseStage = "fetching";
  const enter = (next: ParseStage, message?: string) => {
    stage = next;
    onProgress?.({ stage: next, url, message });
  };

  try {
    enter("fetching");
    const page = await fetchRenderedPage(session, url, {
      ...options.fetch,
      readySelector: readySelectorFor(recordKind),
      signal: deadline.signal,
      prepare:
        recordKind === RecordKind.MARKETPLACE && expandGallery
          ? clickThrough(MARKETPLACE_SELECTORS.galleryNext, MARKETPLACE_SELECTORS.galleryDisabledClass)
          : undefined,
    });

    enter("extracting");
    const extracted = extractPage(page, recordKind, { trimIndex });

    enter("normalizing", `${extracted.fields.length} raw fields`);
    const normalized = normalizeFields(extracted.fields, tables);
    const selected = selectFields(normalized.fields, recordKind, tables, includeKeys);
    const selectedKeys = new Set(selected.map((field) => field.canonicalKey));
    const gaps = normalized.gaps.filter((gap) => selectedKeys.has(gap.field));

    enter("translating", `${selected.length} fields → ${targetLanguage}`);
    const translated = await translateFields(selected, {
      service,
      cache,
      tables,
      targetLanguage,
      signal: deadline.signal,
    });
    // A deadline during translation leaves failures on the record; a cancel does not
    if (signal?.aborted) {
      throw new ParseCancelled(`Parsing ${url} was cancelled`, {
        stage,
        url,
        diagnostic: errorMessage(signal.reason),
        cause: signal.reason,
      });
    }

    enter("assembling");
    const record = assembleRecord({
      sourceUrl: url,
      recordKind,
      fields: translated.fields,
      errors: [...gaps, ...translated.errors],
      language: targetLanguage,
      title: extracted.title,
      imageUrls: extracted.imageUrls,
      configurationUrl: extracted.configurationUrl,
      includeMissing,
    });

    onProgress?.({
      stage: "done",
      url,
      message: `${record.fields.length} fields, ${record.extractionErrors.length} issues`,
    });
    return record;
  } catch (error) {
    const failure = toParseError(error, url, stage, deadline.timedOut(), signal);
    console.error(`[pipeline] ${failure.name} while ${failure.stage} ${url}: ${failure.message}`);
    onProgress?.({ stage: "failed", url, message: failure.message, error: failure });
    throw failure;
  } finally {
    deadline.dispose();
  }
}

export interface ListingWithConfiguration {
  listing: VehicleRecord;
  configuration: VehicleRecord | null;
  configurationError: VehicleParseError | null;
}

/**
 * Parse a listing, then the configuration page it links to. A failure on the
 * configuration page is returned next to the listing instead of thrown.
 */
export async function parseListingWithConfiguration(
  session: BrowserSession,
  url: string,
  options: ParseOptions = {}
): Promise<ListingWithConfiguration> {
  const { includeKeys, ...listingOptions } = options;
  const listing = await parseVehiclePage(session, url, RecordKind.MARKETPLACE, listingOptions);

  if (!listing.configurationUrl) {
    console.log(`[pipeline] No configuration link on ${url}`);
    return { listing, configuration: null, configurationError: null };
  }

  try {
    const configuration = await parseVehiclePage(session, listing.configurationUrl, RecordKind.CONFIGURATION, {
      ...listingOptions,
      includeKeys,
    });
    return { listing, configuration, configurationError: null };
  } catch (error) {
    if (!(error instanceof VehicleParseError)) throw error;
    return { listing, configuration: null, configurationError: error };
  }
}

export interface BatchRequest {
  url: string;
  recordKind: RecordKind;
  options?: ParseOptions;
}

/**
 * Parse independent pages, at most `concurrency` at a time, each on its own
 * page. Results are settled and in request order.
 */
export async function parseBatch(
  session: BrowserSession,
  requests: BatchRequest[],
  options: ParseOptions & { concurrency?: number } = {}
): Promise<PromiseSettledResult<VehicleRecord>[]> {
  const { concurrency = config.maxConcurrentPages, ...shared } = options;
  const size = Math.max(1, concurrency);
  const results: PromiseSettledResult<VehicleRecord>[] = [];

  for (let i = 0; i < requests.length; i += size) {
    const chunk = requests.slice(i, i + size);
    const settled = await Promise.allSettled(
      chunk.map((request) =>
        parseVehiclePage(session, request.url, request.recordKind, { ...shared, ...request.options })
      )
    );
    results.push(...settled);
  }

  const failed = results.filter((r) => r.status === "rejected").length;
  console.log(`[pipeline] Batch finished: ${results.length - failed} parsed, ${failed} failed`);
  return results;
}
