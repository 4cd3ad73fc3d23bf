import * as cheerio from "cheerio";
import { config } from "../config";
import { StructureMismatch } from "../errors";
import { absoluteUrl, cleanText, normalizeImageUrl } from "../scraping/utils";
import { ExtractedPage, RawField, RenderedPage } from "../types";
import { MARKETPLACE_SELECTORS as SEL, PRICE_LABEL, TITLE_LABEL } from "./selectors";

/**
 * Used-car listing page.
 *
 * Summary block: headline, price (glyph-obfuscated, in 万) and info items,
 * each a value <p> followed by a caption <p> ("6.5万公里" / "表显里程").
 * Spec table ("车辆档案"): label/value rows.
 */
export function extractMarketplace(page: RenderedPage): ExtractedPage {
  const $ = cheerio.load(page.html);

  const summary = $(SEL.summary).first();
  if (summary.length === 0) {
    throw new StructureMismatch("summary", { url: page.url, diagnostic: `no match for ${SEL.summary}` });
  }
  const specTable = $(SEL.specTable).first();
  if (specTable.length === 0) {
    throw new StructureMismatch("spec-table", { url: page.url, diagnostic: `no match for ${SEL.specTable}` });
  }

  const fields: RawField[] = [];

  const title = cleanText($(SEL.title).first().text()) || null;
  if (title) {
    fields.push({ label: TITLE_LABEL, value: title, groupPath: [] });
  }

  // An absent price is still reported, as an empty (missing) value
  fields.push({ label: PRICE_LABEL, value: cleanText($(SEL.price).first().text()), groupPath: [] });

  summary.find(SEL.infoItem).each((_, item) => {
    const paragraphs = $(item).find("p");
    const value = cleanText(paragraphs.eq(0).text());
    const label = cleanText(paragraphs.eq(1).text());
    if (!label) {
      console.warn(`[extract] Summary item without caption skipped ("${value}")`);
      return;
    }
    fields.push({ label, value, groupPath: [] });
  });

  specTable.find(SEL.specRow).each((_, row) => {
    const label = cleanText($(row).find(SEL.specLabel).first().text());
    if (!label) return;
    const value = cleanText($(row).find(SEL.specValue).first().text());
    fields.push({ label, value, groupPath: [] });
  });

  const imageUrls: string[] = [];
  $(SEL.galleryImage).each((_, img) => {
    const src = normalizeImageUrl($(img).attr("src") || $(img).attr("data-src"));
    if (src && !imageUrls.includes(src)) imageUrls.push(src);
  });

  const configurationUrl = absoluteUrl(
    $(SEL.configurationLink).first().attr("href"),
    page.finalUrl || config.siteBaseUrl
  );

  console.log(
    `[extract] Marketplace ${page.url}: ${fields.length} fields, ${imageUrls.length} images` +
      (configurationUrl ? ", configuration linked" : "")
  );

  return { fields, title, imageUrls, configurationUrl };
}
