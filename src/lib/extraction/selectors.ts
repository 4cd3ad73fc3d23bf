// Dongchedi ships CSS-module class names with a build hash suffix
// ("head-info_price-wrap__Y4bxi"), so regions are matched on the stable prefix.

export const MARKETPLACE_SELECTORS = {
  // Present once the client has rendered the price block
  ready: '[class*="head-info_price-wrap"]',

  summary: '[class*="head-info_info-wrap"]',
  title: '[class*="head-info_title"], .line-1.tw-flex-1',
  price: '[class*="head-info_price-wrap"] .tw-text-color-red-500',
  infoItem: '[class*="head-info_info-item"]',

  specTable: '[class*="archive_wrap"]',
  specRow: '[class*="archive_item"]',
  specLabel: '[class*="archive_label"]',
  specValue: '[class*="archive_value"]',

  galleryImage: '[class*="head-info_swiper"] img',
  galleryNext: 'button[class*="head-info_swiper-button-next"]',
  galleryDisabledClass: "swiper-button-disabled",

  configurationLink: 'a[href*="/auto/params-carIds-"]',
} as const;

export const CONFIGURATION_SELECTORS = {
  ready: '[class*="configuration_root"]',

  root: '[class*="configuration_root"]',
  group: '[class*="param-group_wrap"]',
  groupTitle: '[class*="param-group_title"]',
  row: '[class*="cell_row"]',
  label: '[class*="cell_label"]',
  value: '[class*="cell_normal"]',
} as const;

// Labels for marketplace fields that the page shows without a caption
export const TITLE_LABEL = "车源标题";
export const PRICE_LABEL = "售价";
