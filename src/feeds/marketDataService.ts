import { MarketApiClient } from '../api/marketApiClient.js';
import { bestBuyPrice, bestSellPrice, splitBySide } from '../core/orderBook.js';
import {
  BestPrice,
  ItemInfo,
  ItemSearchResult,
  Order,
  OrderSide,
  OrdersByItem,
  SplitOrderBook
} from '../core/types.js';
import { mapConcurrent } from '../lib/async.js';
import { AbortedError, errorMessage } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { MarketCache } from '../storage/marketCache.js';

/**
 * What the matcher needs from market data. Implemented by
 * {@link MarketDataService}; tests substitute an in-memory book.
 */
export interface MarketDataSource {
  getSellOrders(marketId: number, ttlMinutes: number, signal?: AbortSignal): Promise<OrdersByItem>;
  getBuyOrders(marketId: number, ttlMinutes: number, signal?: AbortSignal): Promise<OrdersByItem>;
  getItemInfo(itemId: number, signal?: AbortSignal): Promise<ItemInfo>;
  getItemInfoBulk(itemIds: readonly number[], signal?: AbortSignal): Promise<Map<number, ItemInfo>>;
  searchItems(query: string, signal?: AbortSignal): Promise<ItemSearchResult[]>;
}

export interface MarketDataServiceOptions {
  itemTtlHours: number;
  itemFetchConcurrency: number;
}

export const placeholderItem = (itemId: number): ItemInfo => ({
  name: `Item ${itemId}`,
  bulk: 1.0
});

type InflightRequest = {
  signal?: AbortSignal;
  request: Promise<Order[]>;
};

export class MarketDataService implements MarketDataSource {
  private readonly inflight = new Map<string, InflightRequest>();

  constructor(
    private readonly client: MarketApiClient,
    private readonly cache: MarketCache,
    private readonly options: MarketDataServiceOptions
  ) {}

  /**
   * All orders of one market. Pages are read from the cache where fresh and
   * fetched in page order otherwise; page 1 tells how many pages exist.
   *
   * Concurrent callers asking with the same ttl and the same signal share one
   * request. A caller with its own signal gets its own request, so aborting one
   * scan never fails an unrelated read.
   */
  fetchMarketOrders(marketId: number, ttlMinutes: number, signal?: AbortSignal): Promise<Order[]> {
    const key = `${marketId}:${ttlMinutes}`;
    const pending = this.inflight.get(key);
    if (pending && pending.signal === signal) {
      return pending.request;
    }

    const request: Promise<Order[]> = this.loadPages(marketId, ttlMinutes, signal).finally(() => {
      if (this.inflight.get(key)?.request === request) {
        this.inflight.delete(key);
      }
    });
    this.inflight.set(key, { signal, request });
    return request;
  }

  async getOrderBook(marketId: number, ttlMinutes: number, signal?: AbortSignal): Promise<SplitOrderBook> {
    return splitBySide(await this.fetchMarketOrders(marketId, ttlMinutes, signal));
  }

  async getSellOrders(marketId: number, ttlMinutes: number, signal?: AbortSignal): Promise<OrdersByItem> {
    return (await this.getOrderBook(marketId, ttlMinutes, signal)).sells;
  }

  async getBuyOrders(marketId: number, ttlMinutes: number, signal?: AbortSignal): Promise<OrdersByItem> {
    return (await this.getOrderBook(marketId, ttlMinutes, signal)).buys;
  }

  async bestPriceForItem(
    marketId: number,
    itemId: number,
    side: OrderSide,
    ttlMinutes: number,
    signal?: AbortSignal
  ): Promise<BestPrice | undefined> {
    const book = await this.getOrderBook(marketId, ttlMinutes, signal);
    return side === 'sell'
      ? bestSellPrice(book.sells.get(itemId))
      : bestBuyPrice(book.buys.get(itemId));
  }

  async getItemInfo(itemId: number, signal?: AbortSignal): Promise<ItemInfo> {
    const cached = this.cache.getItem(itemId, this.options.itemTtlHours);
    if (cached) {
      return cached;
    }

    try {
      const info = await this.client.fetchItem(itemId, signal);
      this.cache.putItem(itemId, info);
      return info;
    } catch (error) {
      if (error instanceof AbortedError) {
        throw error;
      }
      // Degraded data: callers still get a usable name and bulk.
      logger.warn('Item metadata unavailable, using placeholder', {
        itemId,
        error: errorMessage(error)
      });
      const info = placeholderItem(itemId);
      this.cache.putItem(itemId, info, { placeholder: true });
      return info;
    }
  }

  async getItemInfoBulk(itemIds: readonly number[], signal?: AbortSignal): Promise<Map<number, ItemInfo>> {
    const result = new Map<number, ItemInfo>();
    const toFetch: number[] = [];

    for (const itemId of itemIds) {
      const cached = this.cache.getItem(itemId, this.options.itemTtlHours);
      if (cached) {
        result.set(itemId, cached);
      } else {
        toFetch.push(itemId);
      }
    }

    if (toFetch.length) {
      logger.debug('Resolving item metadata', {
        cached: result.size,
        fetching: toFetch.length
      });
    }

    const fetched = await mapConcurrent(
      toFetch,
      (itemId) => this.getItemInfo(itemId, signal),
      this.options.itemFetchConcurrency
    );
    toFetch.forEach((itemId, index) => result.set(itemId, fetched[index]));

    return result;
  }

  async searchItems(query: string, signal?: AbortSignal): Promise<ItemSearchResult[]> {
    const itemIds = await this.client.searchItems(query, signal);
    const results: ItemSearchResult[] = [];
    for (const itemId of itemIds) {
      const info = await this.getItemInfo(itemId, signal);
      results.push({ itemId, name: info.name });
    }
    return results;
  }

  private async loadPages(marketId: number, ttlMinutes: number, signal?: AbortSignal): Promise<Order[]> {
    const orders: Order[] = [];
    let totalPages = 1;
    let fromCache = 0;

    for (let page = 1; page <= totalPages; page++) {
      const cached = this.cache.getPage(marketId, page, ttlMinutes);
      if (cached) {
        if (page === 1) {
          totalPages = cached.totalPages;
        }
        for (const order of cached.orders) {
          orders.push(order);
        }
        fromCache += 1;
        continue;
      }

      const fetched = await this.client.fetchOrdersPage(marketId, page, signal);
      if (page === 1) {
        totalPages = fetched.totalPages;
      } else if (fetched.totalPages >= page && fetched.totalPages < totalPages) {
        // the book shrank since page 1 was cached
        totalPages = fetched.totalPages;
      }
      this.cache.putPage(marketId, page, fetched.orders, fetched.totalPages);
      for (const order of fetched.orders) {
        orders.push(order);
      }
    }

    logger.debug('Loaded market orders', {
      marketId,
      pages: totalPages,
      fromCache,
      orders: orders.length
    });

    return orders;
  }
}
