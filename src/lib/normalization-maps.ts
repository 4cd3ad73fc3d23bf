import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { config } from "./config";
import { errorMessage } from "./errors";

// ===== Label table =====
// Maps source labels to canonical keys. Lives in data/label-map.json so it can
// be edited (and versioned) without touching code.

export type DisplayNames = Record<string, string>; // language code → text

export interface LabelEntry {
  key: string;
  unit?: string; // default unit when the value carries no suffix
  include: boolean; // default selection for configuration records
  display: DisplayNames;
}

export interface LabelTable {
  version: number;
  entries: Map<string, LabelEntry>; // normalized source label → entry
}

// ===== Value vocabulary =====

export interface UnitEntry {
  id: string;
  display: DisplayNames;
}

export interface Vocabulary {
  version: number;
  notAvailable: Set<string>;
  removals: string[];
  units: Map<string, UnitEntry>; // unit id → entry
  unitSuffixes: Map<string, string>; // lower-cased suffix → unit id
  booleans: Map<string, boolean>; // source text → value
  booleanDisplay: { true: DisplayNames; false: DisplayNames };
  options: Map<string, string>; // source text → option id
  optionDisplay: Map<string, DisplayNames>; // option id → names
}

export interface NormalizationTables {
  labels: LabelTable;
  vocabulary: Vocabulary;
}

const BUNDLED_LABEL_MAP = fileURLToPath(new URL("../../data/label-map.json", import.meta.url));
const BUNDLED_VOCABULARY = fileURLToPath(new URL("../../data/value-vocabulary.json", import.meta.url));

/** Canonical form used for label lookups: NFKC (full-width → ASCII), single spaces. */
export function normalizeLabel(label: string): string {
  return label.normalize("NFKC").replace(/\s+/g, " ").trim();
}

// ===== Validation helpers =====

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(file: string, where: string, problem: string): never {
  throw new Error(`Invalid table ${file}: ${where} ${problem}`);
}

function readRecord(value: unknown, file: string, where: string): Record<string, unknown> {
  if (!isRecord(value)) fail(file, where, "must be an object");
  return value;
}

function readString(value: unknown, file: string, where: string): string {
  if (typeof value !== "string") fail(file, where, "must be a string");
  return value;
}

function readStringList(value: unknown, file: string, where: string): string[] {
  if (!Array.isArray(value)) fail(file, where, "must be an array of strings");
  return value.map((item, i) => readString(item, file, `${where}[${i}]`));
}

function readDisplay(value: unknown, file: string, where: string): DisplayNames {
  const record = readRecord(value, file, where);
  const display: DisplayNames = {};
  for (const [lang, text] of Object.entries(record)) {
    display[lang] = readString(text, file, `${where}.${lang}`);
  }
  return display;
}

function readVersion(root: Record<string, unknown>, file: string): number {
  const version = root.version;
  if (typeof version !== "number" || !Number.isInteger(version)) fail(file, "version", "must be an integer");
  return version;
}

function readJson(path: string): unknown {
  const text = readFileSync(path, "utf-8");
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new Error(`Invalid table ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

// ===== Loaders =====

export function parseLabelTable(json: unknown, file = "label map"): LabelTable {
  const root = readRecord(json, file, "root");
  const labels = readRecord(root.labels, file, "labels");
  const entries = new Map<string, LabelEntry>();

  for (const [label, rawEntry] of Object.entries(labels)) {
    const entry = readRecord(rawEntry, file, `labels["${label}"]`);
    const key = readString(entry.key, file, `labels["${label}"].key`);
    if (!/^[a-z][a-z0-9_]*$/.test(key)) fail(file, `labels["${label}"].key`, `"${key}" is not snake_case`);
    const include = entry.include ?? true;
    if (typeof include !== "boolean") fail(file, `labels["${label}"].include`, "must be a boolean");

    entries.set(normalizeLabel(label), {
      key,
      unit: entry.unit === undefined ? undefined : readString(entry.unit, file, `labels["${label}"].unit`),
      include,
      display: entry.display === undefined ? {} : readDisplay(entry.display, file, `labels["${label}"].display`),
    });
  }

  return { version: readVersion(root, file), entries };
}

export function parseVocabulary(json: unknown, file = "vocabulary"): Vocabulary {
  const root = readRecord(json, file, "root");

  const units = new Map<string, UnitEntry>();
  const unitSuffixes = new Map<string, string>();
  for (const [id, rawUnit] of Object.entries(readRecord(root.units, file, "units"))) {
    const unit = readRecord(rawUnit, file, `units.${id}`);
    units.set(id, { id, display: readDisplay(unit.display, file, `units.${id}.display`) });
    for (const suffix of readStringList(unit.suffixes, file, `units.${id}.suffixes`)) {
      const lower = suffix.toLowerCase();
      const taken = unitSuffixes.get(lower);
      if (taken && taken !== id) fail(file, `units.${id}.suffixes`, `"${suffix}" already belongs to ${taken}`);
      unitSuffixes.set(lower, id);
    }
  }

  const booleanRoot = readRecord(root.booleans, file, "booleans");
  const booleans = new Map<string, boolean>();
  const trueEntry = readRecord(booleanRoot.true, file, "booleans.true");
  const falseEntry = readRecord(booleanRoot.false, file, "booleans.false");
  for (const source of readStringList(trueEntry.sources, file, "booleans.true.sources")) booleans.set(source, true);
  for (const source of readStringList(falseEntry.sources, file, "booleans.false.sources")) booleans.set(source, false);

  const options = new Map<string, string>();
  const optionDisplay = new Map<string, DisplayNames>();
  for (const [id, rawOption] of Object.entries(readRecord(root.options, file, "options"))) {
    const option = readRecord(rawOption, file, `options.${id}`);
    optionDisplay.set(id, readDisplay(option.display, file, `options.${id}.display`));
    for (const source of readStringList(option.sources, file, `options.${id}.sources`)) {
      if (booleans.has(source)) fail(file, `options.${id}.sources`, `"${source}" is also a boolean`);
      options.set(source, id);
    }
  }

  return {
    version: readVersion(root, file),
    notAvailable: new Set(readStringList(root.notAvailable, file, "notAvailable")),
    removals: root.removals === undefined ? [] : readStringList(root.removals, file, "removals"),
    units,
    unitSuffixes,
    booleans,
    booleanDisplay: {
      true: readDisplay(trueEntry.display, file, "booleans.true.display"),
      false: readDisplay(falseEntry.display, file, "booleans.false.display"),
    },
    options,
    optionDisplay,
  };
}

export function loadLabelTable(path: string = config.labelMapPath || BUNDLED_LABEL_MAP): LabelTable {
  const table = parseLabelTable(readJson(path), path);
  console.log(`[normalize] Loaded label map v${table.version} (${table.entries.size} labels) from ${path}`);
  return table;
}

export function loadVocabulary(path: string = config.vocabularyPath || BUNDLED_VOCABULARY): Vocabulary {
  return parseVocabulary(readJson(path), path);
}

let defaultTables: NormalizationTables | null = null;

export function getDefaultTables(): NormalizationTables {
  if (!defaultTables) {
    defaultTables = { labels: loadLabelTable(), vocabulary: loadVocabulary() };
  }
  return defaultTables;
}
