import { mkdirSync, rmSync, writeFileSync } from "fs";
import path from "path";
import { StoredImage } from "./scraping/images";
import { VehicleRecord } from "./types";

export interface ReportBundle {
  listing: VehicleRecord;
  configuration?: VehicleRecord | null;
  images?: StoredImage[];
}

/** `label: value` lines, with a heading whenever the group path changes. */
export function formatRecordText(record: VehicleRecord): string {
  const lines: string[] = [];
  if (record.title) lines.push(record.title);

  let currentGroup = "";
  for (const field of record.fields) {
    const group = field.groupPath.join(" / ");
    if (group && group !== currentGroup) {
      lines.push(`[${group}]`);
    }
    currentGroup = group;
    lines.push(`${field.translatedLabel}: ${field.translatedValue}`);
  }

  if (record.extractionErrors.length > 0) {
    lines.push(`(${record.extractionErrors.length} extraction issues)`);
  }
  return lines.join("\n");
}

/** Remove `dir` and recreate it empty. */
export function resetBundleDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
  mkdirSync(dir, { recursive: true });
}

/**
 * Write `info.json` (records plus image manifest, image paths relative to
 * `dir`). Clears the directory first unless `clear` is false.
 */
export function writeReportBundle(
  dir: string,
  bundle: ReportBundle,
  options: { clear?: boolean } = {}
): string {
  if (options.clear ?? true) {
    resetBundleDir(dir);
  } else {
    mkdirSync(dir, { recursive: true });
  }

  const payload = {
    listing: bundle.listing,
    configuration: bundle.configuration ?? null,
    images: (bundle.images ?? []).map((image) => ({
      ...image,
      path: path.relative(dir, image.path),
    })),
  };

  const file = path.join(dir, "info.json");
  writeFileSync(file, JSON.stringify(payload, null, 2), "utf-8");
  console.log(`[report] Wrote ${file}`);
  return file;
}
