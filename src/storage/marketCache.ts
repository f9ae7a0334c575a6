import { z } from 'zod';
import { CachedPage, ItemInfo, Order } from '../core/types.js';
import { errorMessage } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { SqliteDatabase, Statement } from './database.js';

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

const cachedOrderSchema = z.object({
  orderId: z.number(),
  itemId: z.number(),
  price: z.number(),
  volumeRemain: z.number(),
  side: z.enum(['buy', 'sell']),
  marketId: z.number(),
  locationId: z.number()
});

const cachedOrdersSchema = z.array(cachedOrderSchema);

type PageRow = {
  totalPages: number;
  fetchedAt: number;
  ordersJson: string;
};

type ItemRow = {
  name: string;
  bulk: number;
  placeholder: number;
  fetchedAt: number;
};

export interface MarketCacheOptions {
  /** Lifetime of placeholder item entries written after a failed metadata fetch. */
  placeholderTtlMinutes?: number;
  now?: () => number;
}

/**
 * TTL-keyed store for order-book pages and item metadata.
 *
 * Reads return `undefined` for missing or expired entries; the caller refetches
 * and writes back. Writes are upserts, last writer wins.
 */
export class MarketCache {
  private readonly now: () => number;
  private readonly placeholderTtlMs: number;

  private readonly selectPage: Statement<[number, number], PageRow>;
  private readonly upsertPage: Statement<[number, number, number, number, string]>;
  private readonly selectItem: Statement<[number], ItemRow>;
  private readonly upsertItem: Statement<[number, string, number, number, number]>;
  private readonly countPages: Statement<[], { count: number }>;
  private readonly countItems: Statement<[], { count: number }>;

  constructor(db: SqliteDatabase, options: MarketCacheOptions = {}) {
    this.now = options.now ?? Date.now;
    this.placeholderTtlMs = (options.placeholderTtlMinutes ?? 15) * MINUTE_MS;

    this.selectPage = db.prepare<[number, number], PageRow>(`
      SELECT total_pages AS totalPages, fetched_at AS fetchedAt, orders_json AS ordersJson
      FROM order_pages
      WHERE market_id = ? AND page = ?
    `);

    this.upsertPage = db.prepare<[number, number, number, number, string]>(`
      INSERT INTO order_pages (market_id, page, total_pages, fetched_at, orders_json)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT (market_id, page) DO UPDATE SET
        total_pages = excluded.total_pages,
        fetched_at = excluded.fetched_at,
        orders_json = excluded.orders_json
    `);

    this.selectItem = db.prepare<[number], ItemRow>(`
      SELECT name, bulk, placeholder, fetched_at AS fetchedAt
      FROM items
      WHERE item_id = ?
    `);

    this.upsertItem = db.prepare<[number, string, number, number, number]>(`
      INSERT INTO items (item_id, name, bulk, placeholder, fetched_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT (item_id) DO UPDATE SET
        name = excluded.name,
        bulk = excluded.bulk,
        placeholder = excluded.placeholder,
        fetched_at = excluded.fetched_at
    `);

    this.countPages = db.prepare<[], { count: number }>(
      'SELECT COUNT(*) AS count FROM order_pages'
    );
    this.countItems = db.prepare<[], { count: number }>(
      'SELECT COUNT(*) AS count FROM items'
    );
  }

  getPage(marketId: number, page: number, ttlMinutes: number): CachedPage | undefined {
    const row = this.selectPage.get(marketId, page);
    if (!row || this.now() - row.fetchedAt > ttlMinutes * MINUTE_MS) {
      return undefined;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(row.ordersJson);
    } catch (error) {
      logger.warn('Discarding unreadable cached page', {
        marketId,
        page,
        error: errorMessage(error)
      });
      return undefined;
    }

    const orders = cachedOrdersSchema.safeParse(decoded);
    if (!orders.success) {
      logger.warn('Discarding unreadable cached page', { marketId, page });
      return undefined;
    }

    return {
      marketId,
      page,
      totalPages: row.totalPages,
      fetchedAt: row.fetchedAt,
      orders: orders.data
    };
  }

  putPage(marketId: number, page: number, orders: readonly Order[], totalPages: number): void {
    this.upsertPage.run(marketId, page, totalPages, this.now(), JSON.stringify(orders));
  }

  getItem(itemId: number, ttlHours = 24): ItemInfo | undefined {
    const row = this.selectItem.get(itemId);
    if (!row) {
      return undefined;
    }

    const ttlMs = row.placeholder ? this.placeholderTtlMs : ttlHours * HOUR_MS;
    if (this.now() - row.fetchedAt > ttlMs) {
      return undefined;
    }

    return { name: row.name, bulk: row.bulk };
  }

  putItem(itemId: number, info: ItemInfo, options: { placeholder?: boolean } = {}): void {
    this.upsertItem.run(
      itemId,
      info.name,
      info.bulk,
      options.placeholder ? 1 : 0,
      this.now()
    );
  }

  stats(): { pages: number; items: number } {
    return {
      pages: this.countPages.get()?.count ?? 0,
      items: this.countItems.get()?.count ?? 0
    };
  }
}
