import axios, { AxiosHeaders, AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { ApiConfig } from '../config.js';
import { ItemInfo, Order, OrdersPage } from '../core/types.js';
import { sleep as defaultSleep, Sleep } from '../lib/async.js';
import {
  AbortedError,
  FetchExhaustedError,
  InvalidResponseError,
  TransientNetworkError,
  UpstreamRejectionError,
  errorMessage
} from '../lib/errors.js';
import { logger } from '../lib/logger.js';

const RETRYABLE_STATUSES = new Set([502, 503, 504]);
const PAGES_HEADER = 'x-pages';
const ERROR_BUDGET_HEADER = 'x-error-limit-remain';
const SEARCH_RESULT_LIMIT = 20;

type QueryParams = Record<string, string | number | boolean>;

const wireOrderSchema = z.object({
  order_id: z.number().int(),
  item_id: z.number().int(),
  price: z.number().nonnegative(),
  volume_remain: z.number().int().nonnegative(),
  is_buy_order: z.boolean().default(false),
  location_id: z.number().int()
});

const wireItemSchema = z.object({
  name: z.string().optional(),
  bulk: z.number().nonnegative().optional(),
  packaged_bulk: z.number().nonnegative().optional()
});

const wireSearchSchema = z.object({
  items: z.array(z.number().int()).default([])
});

export type ApiResponse = Pick<AxiosResponse<unknown>, 'status' | 'headers' | 'data'>;

export interface MarketApiClientDeps {
  http?: AxiosInstance;
  sleep?: Sleep;
}

const readHeader = (
  headers: AxiosResponse['headers'],
  name: string
): string | undefined => {
  const value = headers instanceof AxiosHeaders ? headers.get(name) : headers[name];
  if (typeof value === 'string' || typeof value === 'number') {
    return String(value);
  }
  return undefined;
};

const readNumericHeader = (
  headers: AxiosResponse['headers'],
  name: string
): number | undefined => {
  const raw = readHeader(headers, name);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
};

/**
 * HTTP client for the remote market API.
 *
 * Retries connection failures and 502/503/504 with exponential backoff, fails
 * fast on every other non-2xx status, and backs off for a fixed cool-down
 * whenever the upstream reports a low remaining error budget. One instance is
 * shared by every route worker of a run.
 */
export class MarketApiClient {
  private readonly http: AxiosInstance;
  private readonly sleep: Sleep;
  private errorBudget?: number;

  constructor(
    private readonly cfg: ApiConfig,
    deps: MarketApiClientDeps = {}
  ) {
    this.http =
      deps.http ??
      axios.create({
        baseURL: cfg.baseUrl,
        timeout: cfg.timeoutMs,
        headers: { 'User-Agent': cfg.userAgent }
      });
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /** Last error budget reported by the upstream, if any response carried one. */
  get remainingErrorBudget(): number | undefined {
    return this.errorBudget;
  }

  async fetch(
    endpoint: string,
    params: QueryParams = {},
    signal?: AbortSignal
  ): Promise<ApiResponse> {
    const attempts = this.cfg.maxAttempts;
    let lastError: TransientNetworkError | undefined;

    for (let attempt = 0; attempt < attempts; attempt++) {
      this.throwIfAborted(endpoint, signal);

      let response: AxiosResponse<unknown>;
      try {
        response = await this.http.get<unknown>(endpoint, {
          baseURL: this.cfg.baseUrl,
          timeout: this.cfg.timeoutMs,
          headers: { 'User-Agent': this.cfg.userAgent },
          params,
          signal,
          validateStatus: () => true
        });
      } catch (error) {
        if (axios.isCancel(error) || signal?.aborted) {
          throw new AbortedError(`GET ${endpoint}`);
        }
        if (!axios.isAxiosError(error) || error.response) {
          throw error;
        }
        lastError = new TransientNetworkError(endpoint, error.code ?? error.message);
        await this.backoff(endpoint, attempt, lastError, signal);
        continue;
      }

      await this.checkRateLimit(endpoint, response.headers);

      if (response.status >= 200 && response.status < 300) {
        return response;
      }

      if (RETRYABLE_STATUSES.has(response.status)) {
        lastError = new TransientNetworkError(
          endpoint,
          `HTTP ${response.status}`,
          response.status
        );
        await this.backoff(endpoint, attempt, lastError, signal);
        continue;
      }

      throw new UpstreamRejectionError(endpoint, response.status);
    }

    throw new FetchExhaustedError(endpoint, attempts, lastError);
  }

  async fetchOrdersPage(
    marketId: number,
    page: number,
    signal?: AbortSignal
  ): Promise<OrdersPage> {
    const endpoint = `/markets/${marketId}/orders`;
    const response = await this.fetch(endpoint, { page }, signal);
    const wireOrders = this.parse(endpoint, z.array(wireOrderSchema), response.data);

    const orders: Order[] = wireOrders.map((order) => ({
      orderId: order.order_id,
      itemId: order.item_id,
      price: order.price,
      volumeRemain: order.volume_remain,
      side: order.is_buy_order ? 'buy' : 'sell',
      marketId,
      locationId: order.location_id
    }));

    const totalPages = readNumericHeader(response.headers, PAGES_HEADER) ?? 1;
    return { orders, totalPages: Math.max(1, Math.floor(totalPages)) };
  }

  async fetchItem(itemId: number, signal?: AbortSignal): Promise<ItemInfo> {
    const endpoint = `/items/${itemId}`;
    const response = await this.fetch(endpoint, {}, signal);
    const item = this.parse(endpoint, wireItemSchema, response.data);

    return {
      name: item.name ?? `Item ${itemId}`,
      bulk: item.packaged_bulk ?? item.bulk ?? 1.0
    };
  }

  async searchItems(query: string, signal?: AbortSignal): Promise<number[]> {
    const endpoint = '/search';
    const response = await this.fetch(endpoint, { query, strict: false }, signal);
    const result = this.parse(endpoint, wireSearchSchema, response.data);
    return result.items.slice(0, SEARCH_RESULT_LIMIT);
  }

  private parse<S extends z.ZodTypeAny>(
    endpoint: string,
    schema: S,
    data: unknown
  ): z.output<S> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidResponseError(
        endpoint,
        issue ? `${issue.path.join('.')} ${issue.message}`.trim() : 'invalid body'
      );
    }
    return parsed.data;
  }

  private async checkRateLimit(
    endpoint: string,
    headers: AxiosResponse['headers']
  ): Promise<void> {
    const remaining = readNumericHeader(headers, ERROR_BUDGET_HEADER);
    if (remaining === undefined) {
      return;
    }

    this.errorBudget = remaining;
    if (remaining < this.cfg.rateLimitThreshold) {
      logger.warn('Upstream error budget low, cooling down', {
        endpoint,
        remaining,
        cooldownMs: this.cfg.rateLimitCooldownMs
      });
      await this.sleep(this.cfg.rateLimitCooldownMs);
    }
  }

  private async backoff(
    endpoint: string,
    attempt: number,
    error: TransientNetworkError,
    signal?: AbortSignal
  ): Promise<void> {
    if (attempt + 1 >= this.cfg.maxAttempts) {
      return;
    }

    const delayMs = this.cfg.backoffBaseMs * 2 ** attempt;
    logger.warn('Transient upstream failure, retrying', {
      endpoint,
      attempt: attempt + 1,
      delayMs,
      error: errorMessage(error)
    });
    await this.sleep(delayMs);
    this.throwIfAborted(endpoint, signal);
  }

  private throwIfAborted(endpoint: string, signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new AbortedError(`GET ${endpoint}`);
    }
  }
}
