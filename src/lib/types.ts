// ===== Enums =====

export enum RecordKind {
  MARKETPLACE = "marketplace",
  CONFIGURATION = "configuration",
}

/** Ordered: EXACT outranks INFERRED outranks MISSING. */
export enum Confidence {
  EXACT = "exact",
  INFERRED = "inferred",
  MISSING = "missing",
}

export enum ExtractionErrorKind {
  EXTRACTION_GAP = "extraction_gap",
  TRANSLATION_FAILURE = "translation_failure",
}

export type ParseStage =
  | "fetching"
  | "extracting"
  | "normalizing"
  | "translating"
  | "assembling";

// ===== Raw Field (extractor output, messy) =====

export interface RawField {
  label: string;
  value: string;
  groupPath: string[]; // nesting of option group headings, outermost first
}

// ===== Normalized Field =====

export type FieldValue =
  | { kind: "number"; value: number }
  | { kind: "text"; value: string }
  | { kind: "boolean"; value: boolean }
  | { kind: "option"; value: string };

export interface NormalizedField {
  canonicalKey: string;
  label: string; // source label as extracted
  groupPath: string[];
  raw: string; // source value as extracted, never rewritten
  value: FieldValue;
  unit?: string;
  confidence: Confidence;
  mapped: boolean; // label found in the label table
}

export interface TranslatedField extends NormalizedField {
  translatedLabel: string;
  translatedValue: string;
}

export interface ExtractionError {
  field: string;
  reason: string;
  kind: ExtractionErrorKind;
}

// ===== Pages =====

export interface RenderedPage {
  url: string; // requested URL
  finalUrl: string; // after redirects
  status: number;
  html: string;
}

export interface ExtractedPage {
  fields: RawField[];
  title: string | null;
  imageUrls: string[];
  configurationUrl: string | null;
}

// ===== Vehicle Record (assembled, immutable) =====

export interface VehicleRecord {
  readonly sourceUrl: string;
  readonly recordKind: RecordKind;
  readonly language: string;
  readonly title: string | null;
  readonly imageUrls: readonly string[];
  readonly configurationUrl: string | null;
  readonly fields: readonly Readonly<TranslatedField>[];
  readonly extractionErrors: readonly Readonly<ExtractionError>[];
}

export interface ProgressEvent {
  stage: ParseStage | "done" | "failed";
  url: string;
  message?: string;
  error?: Error;
}
