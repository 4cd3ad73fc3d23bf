import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { TranslationCache, openTranslationCache } from "../lib/translation/cache";

describe("TranslationCache", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });

  it("keys entries by language pair", () => {
    const cache = new TranslationCache(":memory:");
    cache.setMany([["白色", "белый"]], "zh", "ru");
    cache.setMany([["白色", "white"]], "zh", "en");

    expect(cache.getMany(["白色", "黑色"], "zh", "ru")).toEqual(new Map([["白色", "белый"]]));
    expect(cache.getMany(["白色"], "zh", "en").get("白色")).toBe("white");
    expect(cache.size()).toBe(2);
    cache.close();
  });

  it("overwrites an existing translation", () => {
    const cache = new TranslationCache(":memory:");
    cache.setMany([["真皮", "кожа"]], "zh", "ru");
    cache.setMany([["真皮", "натуральная кожа"]], "zh", "ru");

    expect(cache.getMany(["真皮"], "zh", "ru").get("真皮")).toBe("натуральная кожа");
    expect(cache.size()).toBe(1);
    cache.close();
  });

  it("persists across instances and creates missing directories", () => {
    const dir = mkdtempSync(path.join(tmpdir(), "translation-cache-"));
    dirs.push(dir);
    const file = path.join(dir, "nested", "cache.db");

    const first = new TranslationCache(file);
    first.setMany([["北京", "Пекин"]], "zh", "ru");
    first.close();

    const second = new TranslationCache(file);
    expect(second.getMany(["北京"], "zh", "ru").get("北京")).toBe("Пекин");
    second.close();
  });

  it("is disabled by an empty path", () => {
    expect(openTranslationCache("")).toBeNull();
  });
});
