import {
  Confidence,
  ExtractionError,
  ExtractionErrorKind,
  FieldValue,
  NormalizedField,
  RawField,
} from "./types";
import {
  LabelEntry,
  NormalizationTables,
  Vocabulary,
  getDefaultTables,
  normalizeLabel,
} from "./normalization-maps";

const CONFIDENCE_RANK: Record<Confidence, number> = {
  [Confidence.EXACT]: 2,
  [Confidence.INFERRED]: 1,
  [Confidence.MISSING]: 0,
};

const MAGNITUDES: Record<string, number> = {
  "万": 4,
  "亿": 8,
};

// sign, digits with optional thousand separators, optional fraction,
// optional magnitude character, then whatever suffix remains
const NUMBER_PATTERN = /^([+-]?(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?)\s*([万亿])?\s*(.*)$/;

interface ParsedValue {
  value: FieldValue;
  unit?: string;
  confidence: Confidence;
}

/**
 * Clean a raw value before matching: drop vocabulary removals ("图示"),
 * fold full-width forms with NFKC and collapse whitespace.
 */
export function cleanValue(raw: string, vocabulary: Vocabulary): string {
  let text = raw;
  for (const removal of vocabulary.removals) {
    text = text.split(removal).join("");
  }
  return text.normalize("NFKC").replace(/\s+/g, " ").trim();
}

/**
 * Multiply a decimal string by 10^places without going through floating
 * point: "15.98" shifted by 4 is exactly 159800.
 */
export function shiftDecimal(text: string, places: number): number {
  const negative = text.startsWith("-");
  const unsigned = text.replace(/^[+-]/, "");
  const [intPart, fracPart = ""] = unsigned.split(".");
  const padded = fracPart.padEnd(places, "0");
  const shifted = Number(`${intPart}${padded.slice(0, places)}.${padded.slice(places) || "0"}`);
  return negative ? -shifted : shifted;
}

export function parseNumeric(
  text: string,
  vocabulary: Vocabulary,
  defaultUnit?: string
): { value: number; unit?: string } | null {
  const match = text.match(NUMBER_PATTERN);
  if (!match) return null;

  const [, digits, magnitude, suffix] = match;
  let unit: string | undefined = defaultUnit;
  if (suffix) {
    const unitId = vocabulary.unitSuffixes.get(suffix.trim().toLowerCase());
    if (!unitId) return null;
    unit = unitId;
  }

  const places = magnitude ? MAGNITUDES[magnitude] ?? 0 : 0;
  const value = shiftDecimal(digits.replace(/,/g, ""), places);
  if (!Number.isFinite(value)) return null;
  return { value, unit };
}

function parseValue(cleaned: string, raw: string, vocabulary: Vocabulary, entry?: LabelEntry): ParsedValue {
  // Explicit "not available" markers keep the raw text untouched
  if (vocabulary.notAvailable.has(cleaned)) {
    return { value: { kind: "text", value: raw }, confidence: Confidence.MISSING };
  }

  const numeric = parseNumeric(cleaned, vocabulary, entry?.unit);
  if (numeric) {
    return {
      value: { kind: "number", value: numeric.value },
      unit: numeric.unit,
      confidence: Confidence.EXACT,
    };
  }

  const bool = vocabulary.booleans.get(cleaned);
  if (bool !== undefined) {
    return { value: { kind: "boolean", value: bool }, confidence: Confidence.EXACT };
  }

  const option = vocabulary.options.get(cleaned);
  if (option) {
    return { value: { kind: "option", value: option }, confidence: Confidence.EXACT };
  }

  return { value: { kind: "text", value: cleaned }, confidence: Confidence.INFERRED };
}

/**
 * Deterministic key for a label the table does not know. Keeps CJK
 * characters, lower-cases ASCII and turns everything else into "_".
 */
export function synthesizeKey(label: string): string {
  const slug = normalizeLabel(label)
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, "_")
    .replace(/^_+|_+$/g, "");
  return `x_${slug || "unlabeled"}`;
}

export function normalize(raw: RawField, tables: NormalizationTables = getDefaultTables()): NormalizedField {
  const { vocabulary, labels } = tables;
  const entry = labels.entries.get(normalizeLabel(raw.label));
  const cleaned = cleanValue(raw.value, vocabulary);
  const parsed = parseValue(cleaned, raw.value, vocabulary, entry);

  let confidence = parsed.confidence;
  if (!entry) {
    console.warn(`[normalize] Unmapped label "${raw.label}" → ${synthesizeKey(raw.label)}`);
    if (confidence === Confidence.EXACT) confidence = Confidence.INFERRED;
  }

  const field: NormalizedField = {
    canonicalKey: entry?.key ?? synthesizeKey(raw.label),
    label: raw.label,
    groupPath: [...raw.groupPath],
    raw: raw.value,
    value: parsed.value,
    confidence,
    mapped: entry !== undefined,
  };
  if (parsed.unit !== undefined) field.unit = parsed.unit;
  return field;
}

export function outranks(a: Confidence, b: Confidence): boolean {
  return CONFIDENCE_RANK[a] > CONFIDENCE_RANK[b];
}

/**
 * Normalize a page's raw fields into a key-unique list in extraction order.
 * A repeated key replaces the earlier field (in its position) only when its
 * confidence is strictly higher. Unmapped labels and missing values are
 * reported as extraction gaps.
 */
export function normalizeFields(
  raws: RawField[],
  tables: NormalizationTables = getDefaultTables()
): { fields: NormalizedField[]; gaps: ExtractionError[] } {
  const fields: NormalizedField[] = [];
  const indexByKey = new Map<string, number>();

  for (const raw of raws) {
    const field = normalize(raw, tables);
    const existing = indexByKey.get(field.canonicalKey);
    if (existing === undefined) {
      indexByKey.set(field.canonicalKey, fields.length);
      fields.push(field);
    } else if (outranks(field.confidence, fields[existing].confidence)) {
      fields[existing] = field;
    }
  }

  const gaps: ExtractionError[] = [];
  for (const field of fields) {
    if (!field.mapped) {
      gaps.push({
        field: field.canonicalKey,
        reason: `Unmapped label "${field.label}"`,
        kind: ExtractionErrorKind.EXTRACTION_GAP,
      });
    }
    if (field.confidence === Confidence.MISSING) {
      gaps.push({
        field: field.canonicalKey,
        reason: `No value for "${field.label}" (source shows "${field.raw}")`,
        kind: ExtractionErrorKind.EXTRACTION_GAP,
      });
    }
  }

  return { fields, gaps };
}
