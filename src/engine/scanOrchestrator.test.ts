import { describe, it, expect, beforeEach } from '@jest/globals';
import { ScanOrchestrator, ScanSettings, expandPairs } from './scanOrchestrator.js';
import { ScanEventBus } from '../lib/eventBus.js';
import {
  PersistenceError,
  ScanAbortedError,
  UpstreamRejectionError
} from '../lib/errors.js';
import { SqliteDatabase, openDatabase } from '../storage/database.js';
import { OpportunityStore } from '../storage/opportunityStore.js';
import { OpportunityMatcher } from '../strategy/opportunityMatcher.js';
import { InMemoryMarketData, testFees, testFilters } from '../testing/fakes.js';

const northEast = { source: 'Northport', destination: 'Eastgate' };
const northSouth = { source: 'Northport', destination: 'Southmere' };
const eastNorth = { source: 'Eastgate', destination: 'Northport' };

const settings: ScanSettings = {
  markets: [
    { name: 'Northport', id: 1001 },
    { name: 'Eastgate', id: 1002 },
    { name: 'Southmere', id: 1003 }
  ],
  pairs: [['Northport', 'Eastgate']],
  fees: testFees,
  filters: testFilters,
  orderTtlMinutes: 5,
  concurrency: 1
};

describe('expandPairs', () => {
  it('scans each pair in both directions', () => {
    expect(
      expandPairs([
        ['Northport', 'Eastgate'],
        ['Northport', 'Southmere']
      ])
    ).toEqual([northEast, eastNorth, northSouth, { source: 'Southmere', destination: 'Northport' }]);
  });
});

describe('ScanOrchestrator', () => {
  let db: SqliteDatabase;
  let store: OpportunityStore;
  let market: InMemoryMarketData;
  let events: ScanEventBus;

  const orchestrator = (overrides: Partial<ScanSettings> = {}) =>
    new ScanOrchestrator(
      new OpportunityMatcher(market),
      store,
      { ...settings, ...overrides },
      events
    );

  beforeEach(() => {
    db = openDatabase(':memory:');
    store = new OpportunityStore(db);
    events = new ScanEventBus();
    // item 1: Northport -> Eastgate, 20.5 x 50 = 1025
    // item 2: Eastgate -> Northport, 65 x 20 = 1300
    market = new InMemoryMarketData()
      .sell(1001, 1, 100, 50)
      .buy(1002, 1, 150, 30)
      .sell(1002, 2, 100, 20)
      .buy(1001, 2, 200, 5)
      .failMarket(1003, new UpstreamRejectionError('/markets/1003/orders', 403));
  });

  it('keeps going when one route fails', async () => {
    const scanner = orchestrator();

    const opportunities = await scanner.runScan([northEast, northSouth, eastNorth]);

    expect(opportunities.map((opportunity) => opportunity.itemId)).toEqual([2, 1]);
    expect(opportunities.map((opportunity) => opportunity.totalProfitPotential)).toEqual([
      expect.closeTo(1300, 6),
      expect.closeTo(1025, 6)
    ]);
    expect(scanner.lastSummary).toMatchObject({
      attempted: 3,
      succeeded: 2,
      failed: 1,
      skipped: [],
      opportunityCount: 2,
      failures: [
        {
          route: northSouth,
          code: 'UPSTREAM_REJECTION',
          reason: 'Upstream rejected /markets/1003/orders with HTTP 403'
        }
      ]
    });
  });

  it('persists each completed route under the scan id', async () => {
    const scanner = orchestrator();

    await scanner.runScan([northEast, northSouth, eastNorth]);
    const scanId = scanner.lastSummary?.scanId;

    expect(store.list({ route: northEast }).map((row) => [row.itemId, row.scanId])).toEqual([
      [1, scanId]
    ]);
    expect(store.list({ route: eastNorth }).map((row) => row.itemId)).toEqual([2]);
    expect(store.list({ route: northSouth })).toEqual([]);
  });

  it('scans both directions of the configured pairs by default', async () => {
    const started: string[][] = [];
    events.on('scanStarted', ({ routes }) =>
      started.push(routes.map((route) => `${route.source}->${route.destination}`))
    );

    await orchestrator().runScan();

    expect(started).toEqual([['Northport->Eastgate', 'Eastgate->Northport']]);
  });

  it('skips routes naming unknown markets', async () => {
    const scanner = orchestrator();
    const atlantis = { source: 'Northport', destination: 'Atlantis' };

    await scanner.runScan([northEast, atlantis]);

    expect(scanner.lastSummary).toMatchObject({
      attempted: 1,
      succeeded: 1,
      skipped: [{ route: atlantis, reason: 'Unknown market: Atlantis' }]
    });
    expect(market.bookRequests).toEqual([1001, 1002]);
  });

  it('leaves a failed route with its previous results', async () => {
    await orchestrator().runScan([northEast]);

    market.failMarket(1001, new UpstreamRejectionError('/markets/1001/orders', 404));
    const scanner = orchestrator();
    await scanner.runScan([northEast]);

    expect(scanner.lastSummary?.failed).toBe(1);
    expect(store.list({ route: northEast }).map((row) => row.itemId)).toEqual([1]);
  });

  it('replaces a route that now yields nothing', async () => {
    await orchestrator().runScan([northEast]);

    await orchestrator({
      filters: { ...testFilters, minProfitMarginPct: 90 }
    }).runScan([northEast]);

    expect(store.list({ route: northEast })).toEqual([]);
  });

  it('records invalid filters as a failure of every route', async () => {
    const scanner = orchestrator({ filters: { ...testFilters, minVolumeAvailable: 0 } });

    await expect(scanner.runScan([northEast, eastNorth])).resolves.toEqual([]);

    expect(scanner.lastSummary).toMatchObject({ attempted: 2, failed: 2, succeeded: 0 });
    expect(scanner.lastSummary?.failures.map((failure) => failure.code)).toEqual([
      'VALIDATION_ERROR',
      'VALIDATION_ERROR'
    ]);
    expect(market.bookRequests).toEqual([]);
  });

  it('fails the whole scan when results cannot be stored', async () => {
    db.close();

    await expect(orchestrator().runScan([northEast])).rejects.toBeInstanceOf(PersistenceError);
  });

  it('rejects with ScanAbortedError when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const scanner = orchestrator();

    const error = await scanner
      .runScan([northEast, eastNorth], { signal: controller.signal })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ScanAbortedError);
    expect(error).toMatchObject({ code: 'SCAN_ABORTED', completedRoutes: 0 });
    expect(market.bookRequests).toEqual([]);
    expect(scanner.lastSummary).toBeUndefined();
  });

  it('keeps routes stored before the deadline when the scan times out', async () => {
    market.stallMarket(1003);
    const scanner = orchestrator();

    const error = await scanner
      .runScan([northEast, northSouth], { timeoutMs: 50 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ScanAbortedError);
    expect(error).toMatchObject({ completedRoutes: 1 });
    expect(store.list({ route: northEast }).map((row) => row.itemId)).toEqual([1]);
    expect(scanner.lastSummary).toBeUndefined();
  });

  it('stops starting routes once the caller aborts mid-scan', async () => {
    const controller = new AbortController();
    events.on('routeCompleted', () => controller.abort());

    const error = await orchestrator()
      .runScan([northEast, eastNorth], { signal: controller.signal })
      .catch((caught: unknown) => caught);

    expect(error).toMatchObject({ code: 'SCAN_ABORTED', completedRoutes: 1 });
    expect(market.bookRequests).toEqual([1001, 1002]);
    expect(store.list({ route: northEast }).map((row) => row.itemId)).toEqual([1]);
    expect(store.list({ route: eastNorth })).toEqual([]);
  });

  it('scans a route listed twice only once', async () => {
    const scanner = orchestrator({
      pairs: [
        ['Northport', 'Eastgate'],
        ['Eastgate', 'Northport']
      ]
    });

    const opportunities = await scanner.runScan();

    expect(opportunities.map((opportunity) => opportunity.itemId)).toEqual([2, 1]);
    expect(scanner.lastSummary).toMatchObject({ attempted: 2, succeeded: 2, opportunityCount: 2 });
    expect(market.bookRequests).toEqual([1001, 1002, 1002, 1001]);
  });

  it('emits route and scan events', async () => {
    const seen: string[] = [];
    events.on('routeCompleted', ({ route, opportunities }) =>
      seen.push(`done ${route.source}->${route.destination} ${opportunities}`)
    );
    events.on('routeFailed', ({ failure }) =>
      seen.push(`failed ${failure.route.source}->${failure.route.destination}`)
    );
    events.on('scanCompleted', (summary) => seen.push(`scan ${summary.opportunityCount}`));

    await orchestrator().runScan([northEast, northSouth, eastNorth]);

    expect(seen).toEqual([
      'done Northport->Eastgate 1',
      'failed Northport->Southmere',
      'done Eastgate->Northport 1',
      'scan 2'
    ]);
  });
});
