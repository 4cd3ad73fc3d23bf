import * as cheerio from "cheerio";
import { StructureMismatch } from "../errors";
import { cleanText } from "../scraping/utils";
import { ExtractedPage, RawField, RenderedPage } from "../types";
import { CONFIGURATION_SELECTORS as SEL } from "./selectors";

export interface ConfigurationExtractOptions {
  /** Which trim column to read on multi-trim pages. */
  trimIndex?: number;
}

/**
 * Model parameter page. Rows sit inside nested group containers; a row's
 * groupPath is the titles of its enclosing groups, outermost first.
 */
export function extractConfiguration(
  page: RenderedPage,
  options: ConfigurationExtractOptions = {}
): ExtractedPage {
  const { trimIndex = 0 } = options;
  const $ = cheerio.load(page.html);

  const root = $(SEL.root).first();
  if (root.length === 0) {
    throw new StructureMismatch("parameter-table", { url: page.url, diagnostic: `no match for ${SEL.root}` });
  }

  const fields: RawField[] = [];
  let shortRows = 0;

  // find() returns document order, which is group-then-row order
  root.find(SEL.row).each((_, row) => {
    const $row = $(row);
    const label = cleanText($row.find(SEL.label).first().text());
    if (!label) return;

    const groupPath = $row
      .parents(SEL.group)
      .toArray()
      .reverse()
      .map((group) => cleanText($(group).children(SEL.groupTitle).first().text()))
      .filter((title) => title.length > 0);

    const cells = $row.find(SEL.value);
    if (cells.length <= trimIndex) shortRows++;
    const value = cells.length > trimIndex ? cleanText(cells.eq(trimIndex).text()) : "";

    fields.push({ label, value, groupPath });
  });

  if (shortRows > 0) {
    console.warn(`[extract] ${shortRows} rows on ${page.url} have no trim column ${trimIndex}`);
  }
  console.log(`[extract] Configuration ${page.url}: ${fields.length} fields`);

  return { fields, title: null, imageUrls: [], configurationUrl: null };
}
