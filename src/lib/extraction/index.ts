import { ExtractedPage, RawField, RecordKind, RenderedPage } from "../types";
import { extractConfiguration, ConfigurationExtractOptions } from "./configuration";
import { extractMarketplace } from "./marketplace";
import { CONFIGURATION_SELECTORS, MARKETPLACE_SELECTORS } from "./selectors";

export type ExtractOptions = ConfigurationExtractOptions;

export function extractPage(page: RenderedPage, kind: RecordKind, options: ExtractOptions = {}): ExtractedPage {
  switch (kind) {
    case RecordKind.MARKETPLACE:
      return extractMarketplace(page);
    case RecordKind.CONFIGURATION:
      return extractConfiguration(page, options);
  }
}

/** Raw fields only; throws StructureMismatch when a required region is absent. */
export function extract(page: RenderedPage, kind: RecordKind, options: ExtractOptions = {}): RawField[] {
  return extractPage(page, kind, options).fields;
}

export function readySelectorFor(kind: RecordKind): string {
  return kind === RecordKind.MARKETPLACE ? MARKETPLACE_SELECTORS.ready : CONFIGURATION_SELECTORS.ready;
}
