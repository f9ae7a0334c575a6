import { errorMessage } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

/**
 * Drives repeated scans. With an interval of 0 a single scan runs and its
 * failure propagates to the caller. Otherwise every scan, the first included,
 * only logs its failure and the next one is scheduled `intervalMs` after the
 * previous one settles.
 */
export class ScanLoop {
  private timer?: NodeJS.Timeout;
  private stopped = false;

  constructor(
    private readonly scan: () => Promise<void>,
    private readonly intervalMs: number
  ) {}

  get repeating(): boolean {
    return this.intervalMs > 0;
  }

  async start(): Promise<void> {
    if (!this.repeating) {
      await this.scan();
      return;
    }
    await this.runOnce();
  }

  stop(): void {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private async runOnce(): Promise<void> {
    try {
      await this.scan();
    } catch (error) {
      logger.error('Scan failed', { error: errorMessage(error) });
    } finally {
      this.scheduleNext();
    }
  }

  private scheduleNext(): void {
    if (this.stopped) {
      return;
    }
    this.timer = setTimeout(() => {
      void this.runOnce();
    }, this.intervalMs);
  }
}
