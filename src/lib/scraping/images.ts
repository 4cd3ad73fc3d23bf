import { mkdirSync } from "fs";
import path from "path";
import sharp from "sharp";
import { fetch as undiciFetch } from "undici";
import { config } from "../config";
import { errorMessage } from "../errors";
import { delay } from "./utils";

export interface StoredImage {
  url: string;
  path: string;
  width: number;
  height: number;
}

export interface DownloadImagesOptions {
  delayMs?: number;
  timeoutMs?: number;
  referer?: string;
  signal?: AbortSignal;
}

async function fetchImage(url: string, options: Required<Omit<DownloadImagesOptions, "signal" | "delayMs">>, signal?: AbortSignal): Promise<Buffer> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const response = await undiciFetch(url, {
      headers: {
        "User-Agent": config.getRandomUserAgent(),
        Accept: "image/avif,image/webp,image/*,*/*;q=0.8",
        Referer: options.referer,
      },
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} for ${url}`);
    }
    return Buffer.from(await response.arrayBuffer());
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onAbort);
  }
}

/**
 * Download gallery images one at a time and store them as JPEG
 * (`image_1.jpg`, `image_2.jpg`, ...). Failed images are logged and skipped.
 */
export async function downloadImages(
  urls: readonly string[],
  dir: string,
  options: DownloadImagesOptions = {}
): Promise<StoredImage[]> {
  const {
    delayMs = config.imageDelayMs,
    timeoutMs = 20000,
    referer = config.imageReferer,
    signal,
  } = options;

  mkdirSync(dir, { recursive: true });
  const stored: StoredImage[] = [];

  for (let i = 0; i < urls.length; i++) {
    if (signal?.aborted) {
      console.warn(`[images] Aborted after ${stored.length}/${urls.length} images`);
      break;
    }
    if (i > 0 && delayMs > 0) await delay(delayMs);

    const url = urls[i];
    const target = path.join(dir, `image_${stored.length + 1}.jpg`);
    try {
      const buffer = await fetchImage(url, { timeoutMs, referer }, signal);
      const info = await sharp(buffer).flatten({ background: "#ffffff" }).jpeg({ quality: 90 }).toFile(target);
      stored.push({ url, path: target, width: info.width, height: info.height });
    } catch (error) {
      console.warn(`[images] Skipping ${url}: ${errorMessage(error)}`);
    }
  }

  console.log(`[images] Stored ${stored.length}/${urls.length} images in ${dir}`);
  return stored;
}
