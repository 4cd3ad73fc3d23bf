import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { resolve } from "path";
import { extract, extractPage, readySelectorFor } from "../lib/extraction";
import { StructureMismatch } from "../lib/errors";
import { RecordKind, RenderedPage } from "../lib/types";

const LISTING_HTML = readFileSync(resolve(__dirname, "fixtures/dongchedi-usedcar.html"), "utf-8");
const PARAMS_HTML = readFileSync(resolve(__dirname, "fixtures/dongchedi-params.html"), "utf-8");

function page(html: string, url = "https://www.dongchedi.com/usedcar/8421337"): RenderedPage {
  return { url, finalUrl: url, status: 200, html };
}

describe("marketplace extraction", () => {
  const extracted = extractPage(page(LISTING_HTML), RecordKind.MARKETPLACE);

  it("emits title, price, summary items and archive rows in page order", () => {
    expect(extracted.fields.map((f) => f.label)).toEqual([
      "车源标题",
      "售价",
      "表显里程",
      "上牌时间",
      "排量",
      "所在地",
      "车身颜色",
      "过户次数",
      "变速箱",
      "年检到期",
      "驾驶辅助",
    ]);
  });

  it("decodes glyph-font digits in price and mileage", () => {
    const byLabel = new Map(extracted.fields.map((f) => [f.label, f.value]));
    expect(byLabel.get("售价")).toBe("15.98万");
    expect(byLabel.get("表显里程")).toBe("6.5万公里");
  });

  it("leaves groupPath empty", () => {
    expect(extracted.fields.every((f) => f.groupPath.length === 0)).toBe(true);
  });

  it("captures the title", () => {
    expect(extracted.title).toBe("2021款 宝马3系 325Li M运动套装");
  });

  it("collects full-size gallery images once, skipping SVG placeholders", () => {
    expect(extracted.imageUrls).toEqual([
      "https://p3-dcd.byteimg.com/img/motor-img/a1b2~1850x0.webp",
      "https://p3-dcd.byteimg.com/img/motor-img/c3d4~1850x0.webp",
    ]);
  });

  it("resolves the configuration link against the page URL", () => {
    expect(extracted.configurationUrl).toBe("https://www.dongchedi.com/auto/params-carIds-58213");
  });

  it("reports an absent price as an empty value", () => {
    const html = LISTING_HTML.replace(/<span class="tw-text-color-red-500">.*?<\/span>/, "");
    const price = extract(page(html), RecordKind.MARKETPLACE).find((f) => f.label === "售价");
    expect(price).toEqual({ label: "售价", value: "", groupPath: [] });
  });

  it("yields no archive fields for an empty archive section", () => {
    const html = LISTING_HTML.replace(/<div class="archive_item__Fh6Tq">.*<\/div>\n/g, "");
    const labels = extract(page(html), RecordKind.MARKETPLACE).map((f) => f.label);
    expect(labels).toEqual(["车源标题", "售价", "表显里程", "上牌时间", "排量", "所在地"]);
  });

  it("raises StructureMismatch when the archive section is absent", () => {
    const html = LISTING_HTML.replace(/<section class="archive_wrap__M3nBv">[\s\S]*<\/section>/, "");
    let caught: unknown;
    try {
      extract(page(html), RecordKind.MARKETPLACE);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(StructureMismatch);
    expect(caught).toMatchObject({
      region: "spec-table",
      stage: "extracting",
      url: "https://www.dongchedi.com/usedcar/8421337",
    });
  });

  it("raises StructureMismatch when the summary block is absent", () => {
    expect(() => extract(page("<html><body><p>验证</p></body></html>"), RecordKind.MARKETPLACE)).toThrow(
      'Region "summary" not found on https://www.dongchedi.com/usedcar/8421337'
    );
  });
});

describe("configuration extraction", () => {
  const url = "https://www.dongchedi.com/auto/params-carIds-58213";

  it("records nested group paths in source order", () => {
    const fields = extract(page(PARAMS_HTML, url), RecordKind.CONFIGURATION);
    expect(fields).toEqual([
      { label: "轮毂尺寸", value: "19英寸", groupPath: ["外观", "轮毂"] },
      { label: "轮毂材质", value: "铝合金", groupPath: ["外观", "轮毂"] },
      { label: "座椅材质", value: "真皮", groupPath: ["内饰", "座椅"] },
      { label: "前排座椅加热", value: "●", groupPath: ["内饰", "座椅"] },
      { label: "上市时间", value: "2021-06", groupPath: ["内饰", "座椅"] },
    ]);
  });

  it("reads the requested trim column", () => {
    const fields = extract(page(PARAMS_HTML, url), RecordKind.CONFIGURATION, { trimIndex: 1 });
    expect(fields.map((f) => f.value)).toEqual(["18英寸", "铝合金", "仿皮", "○", ""]);
  });

  it("has no images or configuration link", () => {
    const extracted = extractPage(page(PARAMS_HTML, url), RecordKind.CONFIGURATION);
    expect(extracted.imageUrls).toEqual([]);
    expect(extracted.configurationUrl).toBeNull();
    expect(extracted.title).toBeNull();
  });

  it("yields zero fields for an empty parameter table", () => {
    const html = '<div class="configuration_root__Hk3Qd"></div>';
    expect(extract(page(html, url), RecordKind.CONFIGURATION)).toEqual([]);
  });

  it("raises StructureMismatch without the parameter table", () => {
    expect(() => extract(page(LISTING_HTML, url), RecordKind.CONFIGURATION)).toThrow(StructureMismatch);
  });
});

describe("readySelectorFor", () => {
  it("waits for the price block on listings and the table on parameter pages", () => {
    expect(readySelectorFor(RecordKind.MARKETPLACE)).toBe('[class*="head-info_price-wrap"]');
    expect(readySelectorFor(RecordKind.CONFIGURATION)).toBe('[class*="configuration_root"]');
  });
});
