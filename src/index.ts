import { MarketApiClient } from './api/marketApiClient.js';
import { loadConfig } from './config.js';
import { ScanLoop } from './engine/scanLoop.js';
import { ScanOrchestrator } from './engine/scanOrchestrator.js';
import { MarketDataService } from './feeds/marketDataService.js';
import { errorMessage } from './lib/errors.js';
import { ScanEventBus } from './lib/eventBus.js';
import { logger, setLogLevel } from './lib/logger.js';
import { ScanReporter } from './monitoring/scanReporter.js';
import { openDatabase } from './storage/database.js';
import { MarketCache } from './storage/marketCache.js';
import { OpportunityStore } from './storage/opportunityStore.js';
import { OpportunityMatcher } from './strategy/opportunityMatcher.js';

const config = loadConfig();
setLogLevel(config.logLevel);

const db = openDatabase(config.databasePath);
const client = new MarketApiClient(config.api);
const cache = new MarketCache(db, {
  placeholderTtlMinutes: config.cache.placeholderTtlMinutes
});
const marketData = new MarketDataService(client, cache, {
  itemTtlHours: config.cache.itemTtlHours,
  itemFetchConcurrency: config.scan.itemFetchConcurrency
});
const events = new ScanEventBus();
const reporter = new ScanReporter(events);
const orchestrator = new ScanOrchestrator(
  new OpportunityMatcher(marketData),
  new OpportunityStore(db),
  {
    markets: config.markets,
    pairs: config.pairs,
    fees: config.fees,
    filters: config.filters,
    orderTtlMinutes: config.cache.orderTtlMinutes,
    concurrency: config.scan.concurrency
  },
  events
);

const shutdownController = new AbortController();

async function scanOnce(): Promise<void> {
  const opportunities = await orchestrator.runScan(undefined, {
    signal: shutdownController.signal,
    timeoutMs: config.scan.timeoutSeconds * 1_000
  });

  const best = opportunities[0];
  if (best) {
    logger.info('Top opportunity', {
      item: best.itemName,
      route: `${best.sourceMarket}->${best.destinationMarket}`,
      netProfitPerUnit: best.netProfitPerUnit.toFixed(2),
      totalProfitPotential: best.totalProfitPotential.toFixed(2)
    });
  }
}

const loop = new ScanLoop(scanOnce, config.scan.intervalSeconds * 1_000);

async function main(): Promise<void> {
  reporter.start();
  logger.info('Market arbitrage scanner running', {
    markets: config.markets.map((market) => market.name),
    pairs: config.pairs.length,
    intervalSeconds: config.scan.intervalSeconds
  });

  await loop.start();

  if (!loop.repeating) {
    reporter.stop();
    db.close();
  }
}

function shutdown(): void {
  logger.info('Shutting down...');
  shutdownController.abort();
  loop.stop();
  reporter.stop();
  if (db.open) {
    db.close();
  }
  process.exit(0);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((error: unknown) => {
  logger.error('Fatal error', { error: errorMessage(error) });
  if (db.open) {
    db.close();
  }
  process.exit(1);
});
