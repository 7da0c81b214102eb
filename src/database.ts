import Database from 'better-sqlite3';
import { z } from 'zod';
import { createProductKey } from './text-normalizer.js';
import type { CachedResult, CategoryPath, KeywordSource, ProductRecord } from './types.js';

const cachedResultSchema = z.object({
  cache_key: z.string(),
  product_type: z.string(),
  level1: z.string(),
  level2: z.string(),
  level3: z.string(),
  keyword: z.string(),
  source: z.enum(['local', 'llm', 'manual']),
  created_at: z.string(),
});

const countRowSchema = z.object({ count: z.number() });
const sourceCountSchema = z.object({ source: z.string(), count: z.number() });

export interface SaveResultInput {
  cacheKey: string;
  productType: string;
  category: CategoryPath;
  keyword: string;
  source: KeywordSource;
}

export interface CacheStats {
  total: number;
  bySource: Record<string, number>;
}

/**
 * Stable cache key for a record: product key of the title, product key of the
 * brand and the lower-cased product type, followed by any `scope` parts such
 * as the taxonomy version and the keyword strategy.
 */
export function createCacheKey(record: ProductRecord, scope: readonly string[] = []): string {
  return [
    createProductKey(record.title),
    createProductKey(record.brand ?? ''),
    record.productType.trim().toLowerCase(),
    ...scope,
  ].join('|');
}

export class ResultCache {
  private db: Database.Database | null = null;

  connect(dbPath: string = './data/results.db'): void {
    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.initializeSchema();
  }

  private initializeSchema(): void {
    if (!this.db) return;

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS product_results (
        cache_key TEXT PRIMARY KEY,
        product_type TEXT NOT NULL,
        level1 TEXT NOT NULL,
        level2 TEXT NOT NULL,
        level3 TEXT NOT NULL,
        keyword TEXT NOT NULL,
        source TEXT NOT NULL CHECK(source IN ('local', 'llm', 'manual')),
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
      )
    `);

    // Create index for per-type listings
    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_product_results_type
      ON product_results(product_type)
    `);
  }

  private connection(): Database.Database {
    if (!this.db) throw new Error('Database not connected');
    return this.db;
  }

  async get(cacheKey: string): Promise<CachedResult | null> {
    const db = this.connection();

    try {
      const row: unknown = db
        .prepare(`
          SELECT cache_key, product_type, level1, level2, level3, keyword, source, created_at
          FROM product_results
          WHERE cache_key = ?
          LIMIT 1
        `)
        .get(cacheKey);

      return row === undefined ? null : cachedResultSchema.parse(row);
    } catch (error) {
      console.error('Error fetching cached result:', error);
      return null;
    }
  }

  async save(input: SaveResultInput): Promise<boolean> {
    const db = this.connection();

    try {
      db.prepare(`
        INSERT INTO product_results (cache_key, product_type, level1, level2, level3, keyword, source)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT (cache_key)
        DO UPDATE SET
          product_type = excluded.product_type,
          level1 = excluded.level1,
          level2 = excluded.level2,
          level3 = excluded.level3,
          keyword = excluded.keyword,
          source = excluded.source,
          updated_at = CURRENT_TIMESTAMP
      `).run(
        input.cacheKey,
        input.productType,
        input.category.level1,
        input.category.level2,
        input.category.level3,
        input.keyword,
        input.source,
      );

      return true;
    } catch (error) {
      console.error('Error saving cached result:', error);
      return false;
    }
  }

  async getAll(productType?: string): Promise<CachedResult[]> {
    const db = this.connection();

    try {
      const columns = 'cache_key, product_type, level1, level2, level3, keyword, source, created_at';
      const rows: unknown[] = productType
        ? db
            .prepare(`SELECT ${columns} FROM product_results WHERE product_type = ? ORDER BY created_at DESC, cache_key`)
            .all(productType)
        : db.prepare(`SELECT ${columns} FROM product_results ORDER BY created_at DESC, cache_key`).all();

      return z.array(cachedResultSchema).parse(rows);
    } catch (error) {
      console.error('Error fetching cached results:', error);
      return [];
    }
  }

  async delete(cacheKey: string): Promise<boolean> {
    const db = this.connection();

    try {
      const result = db.prepare('DELETE FROM product_results WHERE cache_key = ?').run(cacheKey);
      return result.changes > 0;
    } catch (error) {
      console.error('Error deleting cached result:', error);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  isConnected(): boolean {
    return this.db !== null;
  }

  // Get cache statistics
  getStats(): CacheStats {
    const db = this.connection();

    const total = countRowSchema.parse(db.prepare('SELECT COUNT(*) as count FROM product_results').get()).count;

    const sourceRows = z
      .array(sourceCountSchema)
      .parse(db.prepare('SELECT source, COUNT(*) as count FROM product_results GROUP BY source').all());
    const bySource: Record<string, number> = {};
    for (const row of sourceRows) {
      bySource[row.source] = row.count;
    }

    return { total, bySource };
  }
}
