import { DeadlineExceeded, errorMessage } from "../errors";

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Settle with `promise`, or reject with `signal.reason` as soon as the signal
 * aborts. The losing promise keeps running; its late rejection is logged.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;

  const detach = () => {
    promise.catch((err: unknown) => {
      console.warn(`[abort] late rejection after abort: ${errorMessage(err)}`);
    });
  };

  if (signal.aborted) {
    detach();
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      detach();
      reject(signal.reason);
    };
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

export interface Deadline {
  signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
}

/**
 * AbortSignal that fires after `timeoutMs` (reason: DeadlineExceeded) or when
 * the optional parent signal aborts (reason: the parent's reason).
 */
export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new DeadlineExceeded(timeoutMs)), timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => controller.signal.reason instanceof DeadlineExceeded,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

// Dongchedi draws prices and mileage with a private-use-area web font.
// Code points observed on used-car pages; unknown ones pass through unchanged.
const GLYPH_MAP: Record<string, string> = {
  "\ue53d": "1",
  "\ue3f0": "2",
  "\ue422": "3",
  "\ue42c": "4",
  "\ue49c": "5",
  "\ue42b": "6",
  "\ue4fe": "7",
  "\ue548": "8",
  "\ue4c8": "9",
  "\ue453": "0",
  "\ue45f": "万",
  "\ue531": "公",
  "\ue4fc": "里",
};

export function deobfuscateGlyphs(text: string): string {
  return text.replace(/[\ue000-\uf8ff]/g, (ch) => GLYPH_MAP[ch] ?? ch);
}

export function cleanText(raw: string | undefined | null): string {
  if (!raw) return "";
  return deobfuscateGlyphs(raw)
    // Strip zero-width Unicode characters
    .replace(/[\u200b\u200c\u200d\ufeff\u00ad]/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Absolute https URL for a gallery image, or null for SVG placeholders.
 * Thumbnails ("124x0") are swapped for the full-size rendition ("1850x0").
 */
export function normalizeImageUrl(src: string | undefined): string | null {
  if (!src) return null;
  const trimmed = src.trim();
  if (!trimmed || trimmed.startsWith("data:") || /\.svg(?:$|\?)|svg\+xml/i.test(trimmed)) return null;

  let url = trimmed.startsWith("//") ? `https:${trimmed}` : trimmed;
  url = url.replace(/124x0/g, "1850x0");
  return /^https?:\/\//.test(url) ? url : null;
}

export function absoluteUrl(href: string | undefined, baseUrl: string): string | null {
  if (!href) return null;
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}
