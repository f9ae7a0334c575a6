import { Opportunity, Route, StoredOpportunity, routeLabel } from '../core/types.js';
import { PersistenceError, errorMessage } from '../lib/errors.js';
import { SqliteDatabase, Statement } from './database.js';

type OpportunityRow = {
  id: string;
  scanId: string;
  scannedAt: number;
  sourceMarket: string;
  destinationMarket: string;
  itemId: number;
  itemName: string;
  itemBulk: number;
  buyPrice: number;
  sellPrice: number;
  volumeAvailable: number;
  netProfitPerUnit: number;
  profitMarginPct: number;
  totalProfitPotential: number;
};

const SELECT_COLUMNS = `
  id, scan_id AS scanId, scanned_at AS scannedAt,
  source_market AS sourceMarket, destination_market AS destinationMarket,
  item_id AS itemId, item_name AS itemName, item_bulk AS itemBulk,
  buy_price AS buyPrice, sell_price AS sellPrice,
  volume_available AS volumeAvailable, net_profit_per_unit AS netProfitPerUnit,
  profit_margin_pct AS profitMarginPct, total_profit_potential AS totalProfitPotential
`;

export interface ListOptions {
  limit?: number;
  route?: Route;
}

/**
 * Persisted result set of the latest scan of each route. A route's rows are
 * always replaced as a whole inside one transaction.
 */
export class OpportunityStore {
  private readonly deleteRoute: Statement<[string, string]>;
  private readonly insertRow: Statement<[OpportunityRow]>;
  private readonly selectAll: Statement<[number], OpportunityRow>;
  private readonly selectRoute: Statement<[string, string, number], OpportunityRow>;
  private readonly selectLastScan: Statement<[], { last: number | null }>;
  private readonly replace: (route: Route, rows: OpportunityRow[]) => void;

  constructor(
    db: SqliteDatabase,
    private readonly now: () => number = Date.now
  ) {
    this.deleteRoute = db.prepare<[string, string]>(
      'DELETE FROM opportunities WHERE source_market = ? AND destination_market = ?'
    );

    this.insertRow = db.prepare<[OpportunityRow]>(`
      INSERT INTO opportunities (
        id, scan_id, scanned_at, source_market, destination_market,
        item_id, item_name, item_bulk, buy_price, sell_price,
        volume_available, net_profit_per_unit, profit_margin_pct, total_profit_potential
      ) VALUES (
        @id, @scanId, @scannedAt, @sourceMarket, @destinationMarket,
        @itemId, @itemName, @itemBulk, @buyPrice, @sellPrice,
        @volumeAvailable, @netProfitPerUnit, @profitMarginPct, @totalProfitPotential
      )
    `);

    this.selectAll = db.prepare<[number], OpportunityRow>(`
      SELECT ${SELECT_COLUMNS}
      FROM opportunities
      ORDER BY total_profit_potential DESC
      LIMIT ?
    `);

    this.selectRoute = db.prepare<[string, string, number], OpportunityRow>(`
      SELECT ${SELECT_COLUMNS}
      FROM opportunities
      WHERE source_market = ? AND destination_market = ?
      ORDER BY total_profit_potential DESC
      LIMIT ?
    `);

    this.selectLastScan = db.prepare<[], { last: number | null }>(
      'SELECT MAX(scanned_at) AS last FROM opportunities'
    );

    this.replace = db.transaction((route: Route, rows: OpportunityRow[]) => {
      this.deleteRoute.run(route.source, route.destination);
      for (const row of rows) {
        this.insertRow.run(row);
      }
    });
  }

  /** Swap the stored set of `route` for `opportunities`; an empty list clears it. */
  replaceRoute(route: Route, opportunities: readonly Opportunity[], scanId: string): void {
    const scannedAt = this.now();
    const rows = opportunities.map((opportunity) => ({
      ...opportunity,
      scanId,
      scannedAt
    }));

    try {
      this.replace(route, rows);
    } catch (error) {
      throw new PersistenceError(
        `Failed to store results for ${routeLabel(route)}: ${errorMessage(error)}`,
        error
      );
    }
  }

  list(options: ListOptions = {}): StoredOpportunity[] {
    const limit = options.limit ?? 100;
    if (options.route) {
      return this.selectRoute.all(options.route.source, options.route.destination, limit);
    }
    return this.selectAll.all(limit);
  }

  lastScanTime(): number | undefined {
    return this.selectLastScan.get()?.last ?? undefined;
  }
}
