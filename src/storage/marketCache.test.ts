import { describe, it, expect, beforeEach } from '@jest/globals';
import { MarketCache } from './marketCache.js';
import { SqliteDatabase, openDatabase } from './database.js';
import { makeOrder } from '../testing/fakes.js';

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;
const T0 = 1_700_000_000_000;

describe('MarketCache', () => {
  let clock: number;
  let db: SqliteDatabase;
  let cache: MarketCache;

  beforeEach(() => {
    clock = T0;
    db = openDatabase(':memory:');
    cache = new MarketCache(db, {
      placeholderTtlMinutes: 15,
      now: () => clock
    });
  });

  describe('order pages', () => {
    const orders = [makeOrder(1001, 34, 'sell', 5, 100), makeOrder(1001, 35, 'buy', 9, 3)];

    it('is absent before anything is stored', () => {
      expect(cache.getPage(1001, 1, 5)).toBeUndefined();
    });

    it('returns a stored page with its timestamp and page count', () => {
      cache.putPage(1001, 1, orders, 3);

      expect(cache.getPage(1001, 1, 5)).toEqual({
        marketId: 1001,
        page: 1,
        totalPages: 3,
        fetchedAt: T0,
        orders
      });
    });

    it('keeps pages of different markets and page numbers apart', () => {
      cache.putPage(1001, 1, orders, 2);
      expect(cache.getPage(1001, 2, 5)).toBeUndefined();
      expect(cache.getPage(1002, 1, 5)).toBeUndefined();
    });

    it('is valid up to the ttl and absent strictly after it', () => {
      cache.putPage(1001, 1, orders, 1);

      clock = T0 + 5 * MINUTE - 1;
      expect(cache.getPage(1001, 1, 5)).toBeDefined();

      clock = T0 + 5 * MINUTE;
      expect(cache.getPage(1001, 1, 5)).toBeDefined();

      clock = T0 + 5 * MINUTE + 1;
      expect(cache.getPage(1001, 1, 5)).toBeUndefined();
    });

    it('treats a row that is not valid JSON as absent', () => {
      cache.putPage(1001, 1, orders, 1);
      db.prepare("UPDATE order_pages SET orders_json = '[{\"orderId\":'").run();

      expect(cache.getPage(1001, 1, 5)).toBeUndefined();
    });

    it('treats a row with unexpected order fields as absent', () => {
      cache.putPage(1001, 1, orders, 1);
      db.prepare(`UPDATE order_pages SET orders_json = '[{"orderId":1}]'`).run();

      expect(cache.getPage(1001, 1, 5)).toBeUndefined();
    });

    it('upserts a single row per key with the latest write', () => {
      cache.putPage(1001, 1, orders, 1);
      clock = T0 + 1_000;
      cache.putPage(1001, 1, orders.slice(0, 1), 2);

      expect(cache.stats().pages).toBe(1);
      expect(cache.getPage(1001, 1, 5)).toMatchObject({
        fetchedAt: T0 + 1_000,
        totalPages: 2,
        orders: orders.slice(0, 1)
      });
    });
  });

  describe('items', () => {
    it('expires regular entries after 24 hours by default', () => {
      cache.putItem(34, { name: 'Iron Ingot', bulk: 0.01 });

      clock = T0 + 24 * HOUR;
      expect(cache.getItem(34)).toEqual({ name: 'Iron Ingot', bulk: 0.01 });

      clock = T0 + 24 * HOUR + 1;
      expect(cache.getItem(34)).toBeUndefined();
    });

    it('honours a caller supplied ttl', () => {
      cache.putItem(34, { name: 'Iron Ingot', bulk: 0.01 });
      clock = T0 + 2 * HOUR;
      expect(cache.getItem(34, 1)).toBeUndefined();
    });

    it('expires placeholder entries after their own shorter ttl', () => {
      cache.putItem(99, { name: 'Item 99', bulk: 1 }, { placeholder: true });

      clock = T0 + 15 * MINUTE;
      expect(cache.getItem(99)).toEqual({ name: 'Item 99', bulk: 1 });

      clock = T0 + 15 * MINUTE + 1;
      expect(cache.getItem(99)).toBeUndefined();
    });

    it('replaces a placeholder with real metadata', () => {
      cache.putItem(99, { name: 'Item 99', bulk: 1 }, { placeholder: true });
      cache.putItem(99, { name: 'Copper Wire', bulk: 0.5 });

      clock = T0 + 2 * HOUR;
      expect(cache.getItem(99)).toEqual({ name: 'Copper Wire', bulk: 0.5 });
      expect(cache.stats().items).toBe(1);
    });
  });
});
