import { config } from "./config";
import {
  Confidence,
  ExtractionError,
  RecordKind,
  TranslatedField,
  VehicleRecord,
} from "./types";

export interface AssembleInput {
  sourceUrl: string;
  recordKind: RecordKind;
  fields: TranslatedField[];
  errors: ExtractionError[];
  language?: string;
  title?: string | null;
  imageUrls?: string[];
  configurationUrl?: string | null;
  /** Keep fields whose value is missing ("with empty parameters"). */
  includeMissing?: boolean;
}

function groupKey(path: string[]): string {
  return JSON.stringify(path);
}

/**
 * Order fields by group (first appearance of each group path), keeping source
 * order inside a group. Rows of a group split by another group are pulled
 * together under the first one.
 */
export function orderFields<T extends { groupPath: string[] }>(fields: T[]): T[] {
  const groups = new Map<string, T[]>();
  for (const field of fields) {
    const key = groupKey(field.groupPath);
    const group = groups.get(key);
    if (group) {
      group.push(field);
    } else {
      groups.set(key, [field]);
    }
  }
  return Array.from(groups.values()).flat();
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export function assembleRecord(input: AssembleInput): VehicleRecord {
  const includeMissing = input.includeMissing ?? config.includeMissingFields;
  const ordered = orderFields(input.fields).filter(
    (field) => includeMissing || field.confidence !== Confidence.MISSING
  );

  const record: VehicleRecord = {
    sourceUrl: input.sourceUrl,
    recordKind: input.recordKind,
    language: input.language ?? config.targetLanguage,
    title: input.title ?? null,
    imageUrls: [...(input.imageUrls ?? [])],
    configurationUrl: input.configurationUrl ?? null,
    fields: ordered.map((field) => ({
      ...field,
      groupPath: [...field.groupPath],
      value: { ...field.value },
    })),
    extractionErrors: input.errors.map((error) => ({ ...error })),
  };

  return deepFreeze(record);
}
