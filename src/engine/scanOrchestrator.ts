import { v4 as uuid } from 'uuid';
import { FeeConfig, MarketConfig, MarketPair, OpportunityFilters } from '../config.js';
import {
  Opportunity,
  Route,
  RouteFailure,
  RouteSkip,
  ScanSummary,
  routeLabel
} from '../core/types.js';
import { mapConcurrent } from '../lib/async.js';
import { ScanAbortedError, errorCode, errorMessage } from '../lib/errors.js';
import { ScanEventBus } from '../lib/eventBus.js';
import { logger } from '../lib/logger.js';
import { OpportunityStore } from '../storage/opportunityStore.js';
import { OpportunityMatcher } from '../strategy/opportunityMatcher.js';

export interface ScanSettings {
  markets: readonly MarketConfig[];
  pairs: readonly MarketPair[];
  fees: FeeConfig;
  filters: OpportunityFilters;
  orderTtlMinutes: number;
  concurrency: number;
}

export interface ScanOptions {
  signal?: AbortSignal;
  /** Deadline for the whole scan; 0 or absent means none. */
  timeoutMs?: number;
}

type ResolvedRoute = {
  route: Route;
  source: MarketConfig;
  destination: MarketConfig;
};

type RouteOutcome =
  | { status: 'succeeded'; route: Route; opportunities: Opportunity[] }
  | { status: 'failed'; route: Route; failure: RouteFailure }
  | { status: 'aborted'; route: Route };

type Succeeded = Extract<RouteOutcome, { status: 'succeeded' }>;
type Failed = Extract<RouteOutcome, { status: 'failed' }>;

/** Each configured pair (A, B) scans both A->B and B->A. */
export const expandPairs = (pairs: readonly MarketPair[]): Route[] =>
  pairs.flatMap(([a, b]) => [
    { source: a, destination: b },
    { source: b, destination: a }
  ]);

const byProfitPotential = (a: Opportunity, b: Opportunity): number =>
  b.totalProfitPotential - a.totalProfitPotential;

const linkAbort = (controller: AbortController, options: ScanOptions): (() => void) => {
  const onAbort = () => controller.abort();
  const { signal, timeoutMs } = options;

  if (signal?.aborted) {
    controller.abort();
  }
  signal?.addEventListener('abort', onAbort, { once: true });
  const timer = timeoutMs && timeoutMs > 0 ? setTimeout(onAbort, timeoutMs) : undefined;

  return () => {
    signal?.removeEventListener('abort', onAbort);
    if (timer) {
      clearTimeout(timer);
    }
  };
};

/**
 * Runs the matcher over a set of routes on a bounded pool. A failing route is
 * recorded and the rest carry on; each completed route replaces its stored
 * results as soon as it finishes.
 */
export class ScanOrchestrator {
  private readonly marketsByName: Map<string, MarketConfig>;
  private summary?: ScanSummary;

  constructor(
    private readonly matcher: OpportunityMatcher,
    private readonly store: OpportunityStore,
    private readonly settings: ScanSettings,
    private readonly events: ScanEventBus = new ScanEventBus(),
    private readonly now: () => number = Date.now
  ) {
    this.marketsByName = new Map(settings.markets.map((market) => [market.name, market]));
  }

  get lastSummary(): ScanSummary | undefined {
    return this.summary;
  }

  async runScan(routes?: readonly Route[], options: ScanOptions = {}): Promise<Opportunity[]> {
    const scanId = uuid();
    const startedAt = this.now();
    const { valid, skipped } = this.resolveRoutes(routes ?? expandPairs(this.settings.pairs));

    const controller = new AbortController();
    const release = linkAbort(controller, options);

    this.events.emit('scanStarted', { scanId, routes: valid.map((entry) => entry.route) });
    logger.info('Scan started', {
      scanId,
      routes: valid.map((entry) => routeLabel(entry.route)),
      skipped: skipped.length
    });

    let outcomes: RouteOutcome[];
    try {
      outcomes = await mapConcurrent(
        valid,
        (entry) => this.scanRoute(scanId, entry, controller.signal),
        this.settings.concurrency
      );
    } catch (error) {
      controller.abort();
      logger.error('Scan failed', { scanId, error: errorMessage(error) });
      throw error;
    } finally {
      release();
    }

    const succeeded = outcomes.filter((outcome): outcome is Succeeded => outcome.status === 'succeeded');
    const failed = outcomes.filter((outcome): outcome is Failed => outcome.status === 'failed');

    if (outcomes.some((outcome) => outcome.status === 'aborted')) {
      logger.warn('Scan aborted', { scanId, completedRoutes: succeeded.length });
      throw new ScanAbortedError(scanId, succeeded.length);
    }

    const opportunities = succeeded
      .flatMap((outcome) => outcome.opportunities)
      .sort(byProfitPotential);

    const summary: ScanSummary = {
      scanId,
      startedAt,
      finishedAt: this.now(),
      attempted: succeeded.length + failed.length,
      succeeded: succeeded.length,
      failed: failed.length,
      skipped,
      failures: failed.map((outcome) => outcome.failure),
      opportunityCount: opportunities.length
    };

    this.summary = summary;
    this.events.emit('scanCompleted', summary);

    return opportunities;
  }

  private resolveRoutes(routes: readonly Route[]): { valid: ResolvedRoute[]; skipped: RouteSkip[] } {
    const valid: ResolvedRoute[] = [];
    const skipped: RouteSkip[] = [];
    const seen = new Set<string>();

    for (const route of routes) {
      const label = routeLabel(route);
      if (seen.has(label)) {
        logger.debug('Ignoring duplicate route', { route: label });
        continue;
      }
      seen.add(label);

      const source = this.marketsByName.get(route.source);
      const destination = this.marketsByName.get(route.destination);

      if (!source || !destination) {
        const unknown = [route.source, route.destination].filter(
          (name) => !this.marketsByName.has(name)
        );
        const reason = `Unknown market: ${unknown.join(', ')}`;
        logger.warn('Skipping route with unknown market', {
          route: label,
          unknown
        });
        skipped.push({ route, reason });
        continue;
      }

      valid.push({ route, source, destination });
    }

    return { valid, skipped };
  }

  private async scanRoute(
    scanId: string,
    { route, source, destination }: ResolvedRoute,
    signal: AbortSignal
  ): Promise<RouteOutcome> {
    if (signal.aborted) {
      return { status: 'aborted', route };
    }

    const started = this.now();
    let opportunities: Opportunity[];

    try {
      opportunities = await this.matcher.findOpportunities(
        source,
        destination,
        this.settings.fees,
        this.settings.filters,
        this.settings.orderTtlMinutes,
        signal
      );
    } catch (error) {
      if (signal.aborted) {
        return { status: 'aborted', route };
      }

      const failure: RouteFailure = {
        route,
        code: errorCode(error),
        reason: errorMessage(error)
      };
      logger.warn('Route scan failed', {
        scanId,
        route: routeLabel(route),
        code: failure.code,
        error: failure.reason
      });
      this.events.emit('routeFailed', { scanId, failure });
      return { status: 'failed', route, failure };
    }

    // persistence failures are fatal for the scan and propagate
    this.store.replaceRoute(route, opportunities, scanId);

    const durationMs = this.now() - started;
    logger.info('Route scanned', {
      scanId,
      route: routeLabel(route),
      opportunities: opportunities.length,
      durationMs
    });
    this.events.emit('routeCompleted', {
      scanId,
      route,
      opportunities: opportunities.length,
      durationMs
    });

    return { status: 'succeeded', route, opportunities };
  }
}
