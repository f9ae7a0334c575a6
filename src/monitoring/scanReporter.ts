import { RouteFailure, ScanSummary, routeLabel } from '../core/types.js';
import { ScanEventBus } from '../lib/eventBus.js';
import { logger } from '../lib/logger.js';

interface Counters {
  scans: number;
  routesSucceeded: number;
  routesFailed: number;
  opportunities: number;
}

export const formatSummary = (summary: ScanSummary): string[] => {
  const lines = [
    `Scan ${summary.scanId}: ${summary.attempted} routes attempted, ` +
      `${summary.succeeded} succeeded, ${summary.failed} failed, ` +
      `${summary.opportunityCount} opportunities`
  ];

  for (const failure of summary.failures) {
    lines.push(`  ${routeLabel(failure.route)} failed: ${failure.reason}`);
  }
  for (const skip of summary.skipped) {
    lines.push(`  ${routeLabel(skip.route)} skipped: ${skip.reason}`);
  }

  return lines;
};

/** Logs each scan summary and keeps running totals across repeated scans. */
export class ScanReporter {
  private readonly counters: Counters = {
    scans: 0,
    routesSucceeded: 0,
    routesFailed: 0,
    opportunities: 0
  };

  private readonly onFailed = ({ scanId, failure }: { scanId: string; failure: RouteFailure }) => {
    logger.debug('Route failure recorded', {
      scanId,
      route: routeLabel(failure.route),
      code: failure.code
    });
  };

  private readonly onCompleted = (summary: ScanSummary) => {
    this.counters.scans += 1;
    this.counters.routesSucceeded += summary.succeeded;
    this.counters.routesFailed += summary.failed;
    this.counters.opportunities += summary.opportunityCount;

    logger.info('Scan complete', {
      summary: formatSummary(summary),
      durationMs: summary.finishedAt - summary.startedAt,
      totals: { ...this.counters }
    });
  };

  constructor(private readonly events: ScanEventBus) {}

  start(): void {
    this.events.on('routeFailed', this.onFailed);
    this.events.on('scanCompleted', this.onCompleted);
  }

  stop(): void {
    this.events.off('routeFailed', this.onFailed);
    this.events.off('scanCompleted', this.onCompleted);
  }

  totals(): Counters {
    return { ...this.counters };
  }
}
