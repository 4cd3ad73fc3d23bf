import path from "path";
import { config } from "../lib/config";
import { errorMessage, VehicleParseError } from "../lib/errors";
import { ParseOptions, parseListingWithConfiguration, parseVehiclePage } from "../lib/pipeline";
import { formatRecordText, resetBundleDir, writeReportBundle } from "../lib/report";
import { BrowserSession, closeOnExit } from "../lib/scraping/browser";
import { StoredImage, downloadImages } from "../lib/scraping/images";
import { createTranslationService } from "../lib/translation/anthropic";
import { openTranslationCache } from "../lib/translation/cache";
import { ProgressEvent, RecordKind, VehicleRecord } from "../lib/types";
import { parseCliArgs } from "./cli-args";

function printProgress(event: ProgressEvent): void {
  const detail = event.message ? ` (${event.message})` : "";
  console.log(`→ ${event.stage}: ${event.url}${detail}`);
}

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  const outDir = path.resolve(args.outDir ?? config.outputDir);

  const session = new BrowserSession();
  closeOnExit(session);
  const cache = openTranslationCache();

  const options: ParseOptions = {
    timeoutMs: args.timeoutMs,
    includeKeys: args.keys,
    includeMissing: args.includeMissing,
    targetLanguage: args.lang,
    service: createTranslationService(),
    cache,
    onProgress: printProgress,
  };

  try {
    let listing: VehicleRecord;
    let configuration: VehicleRecord | null = null;

    if (args.withConfig) {
      const result = await parseListingWithConfiguration(session, args.url, options);
      listing = result.listing;
      configuration = result.configuration;
      if (result.configurationError) {
        console.warn(`Configuration page failed: ${result.configurationError.message}`);
      }
    } else {
      listing = await parseVehiclePage(session, args.url, args.kind, options);
    }

    resetBundleDir(outDir);
    let images: StoredImage[] = [];
    if (args.images && listing.recordKind === RecordKind.MARKETPLACE) {
      images = await downloadImages(listing.imageUrls, path.join(outDir, "images"));
    }
    writeReportBundle(outDir, { listing, configuration, images }, { clear: false });

    console.log(`\n=== ${listing.sourceUrl} ===`);
    console.log(formatRecordText(listing));
    if (configuration) {
      console.log(`\n=== ${configuration.sourceUrl} ===`);
      console.log(formatRecordText(configuration));
    }
    return 0;
  } catch (error) {
    if (error instanceof VehicleParseError) {
      console.error(`\n${error.name} (${error.stage}) for ${error.url}: ${error.message}`);
      if (error.diagnostic) console.error(`  ${error.diagnostic}`);
      return 1;
    }
    throw error;
  } finally {
    cache?.close();
    await session.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error("Fatal error:", errorMessage(err));
    process.exit(1);
  });
