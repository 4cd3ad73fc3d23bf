import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import path from "path";
import { config } from "../config";

/**
 * Successful translations keyed by (source language, target language, text),
 * reused across runs.
 */
export class TranslationCache {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(path.dirname(path.resolve(process.cwd(), dbPath)), { recursive: true });
    }
    this.db = new Database(dbPath);
    if (dbPath !== ":memory:") this.db.pragma("journal_mode = WAL");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS translations (
        source_lang TEXT NOT NULL,
        target_lang TEXT NOT NULL,
        source_text TEXT NOT NULL,
        translated_text TEXT NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY (source_lang, target_lang, source_text)
      );
    `);
  }

  getMany(texts: string[], sourceLanguage: string, targetLanguage: string): Map<string, string> {
    const stmt = this.db
      .prepare(
        "SELECT translated_text FROM translations WHERE source_lang = ? AND target_lang = ? AND source_text = ?"
      )
      .pluck();

    const hits = new Map<string, string>();
    for (const text of texts) {
      const translated: unknown = stmt.get(sourceLanguage, targetLanguage, text);
      if (typeof translated === "string") hits.set(text, translated);
    }
    return hits;
  }

  setMany(entries: Iterable<[string, string]>, sourceLanguage: string, targetLanguage: string): void {
    const stmt = this.db.prepare(
      `INSERT OR REPLACE INTO translations (source_lang, target_lang, source_text, translated_text, created_at)
       VALUES (?, ?, ?, ?, ?)`
    );
    const now = new Date().toISOString();
    const insertAll = this.db.transaction((rows: [string, string][]) => {
      for (const [source, translated] of rows) {
        stmt.run(sourceLanguage, targetLanguage, source, translated, now);
      }
    });
    insertAll([...entries]);
  }

  size(): number {
    const count: unknown = this.db.prepare("SELECT COUNT(*) FROM translations").pluck().get();
    return typeof count === "number" ? count : 0;
  }

  close(): void {
    this.db.close();
  }
}

/** Cache at the configured path, or null when caching is disabled (empty path). */
export function openTranslationCache(dbPath: string = config.translationCachePath): TranslationCache | null {
  if (!dbPath) return null;
  console.log(`[cache] Translation cache at ${dbPath}`);
  return new TranslationCache(dbPath);
}
