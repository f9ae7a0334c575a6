import { v4 as uuid } from 'uuid';
import { FeeConfig, OpportunityFilters } from '../config.js';
import { calculateProfit, isProfitable } from '../core/fees.js';
import { bestBuyPrice, bestSellPrice } from '../core/orderBook.js';
import { MarketRef, Opportunity } from '../core/types.js';
import { ValidationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { MarketDataSource } from '../feeds/marketDataService.js';

export const validateFilters = (filters: OpportunityFilters): void => {
  const checks: Array<[keyof OpportunityFilters, boolean]> = [
    ['minProfitMarginPct', Number.isFinite(filters.minProfitMarginPct) && filters.minProfitMarginPct >= 0],
    ['minNetProfit', Number.isFinite(filters.minNetProfit) && filters.minNetProfit >= 0],
    ['maxInvestmentPerItem', Number.isFinite(filters.maxInvestmentPerItem) && filters.maxInvestmentPerItem >= 0],
    ['minVolumeAvailable', Number.isFinite(filters.minVolumeAvailable) && filters.minVolumeAvailable > 0]
  ];

  for (const [field, ok] of checks) {
    if (!ok) {
      throw new ValidationError(`Invalid filter ${field}: ${filters[field]}`, field);
    }
  }
};

/**
 * Finds items that can be bought from sell orders in one market and sold into
 * buy orders in another at a profit after fees and transport.
 */
export class OpportunityMatcher {
  constructor(private readonly market: MarketDataSource) {}

  async findOpportunities(
    source: MarketRef,
    destination: MarketRef,
    fees: FeeConfig,
    filters: OpportunityFilters,
    ttlMinutes: number,
    signal?: AbortSignal
  ): Promise<Opportunity[]> {
    validateFilters(filters);

    const [sourceSells, destinationBuys] = await Promise.all([
      this.market.getSellOrders(source.id, ttlMinutes, signal),
      this.market.getBuyOrders(destination.id, ttlMinutes, signal)
    ]);

    const candidates = [...sourceSells.keys()].filter((itemId) =>
      destinationBuys.has(itemId)
    );

    logger.debug('Analysing common items', {
      source: source.name,
      destination: destination.name,
      candidates: candidates.length
    });

    const items = await this.market.getItemInfoBulk(candidates, signal);
    const opportunities: Opportunity[] = [];

    for (const itemId of candidates) {
      // we buy from the cheapest seller and sell to the highest bidder
      const ask = bestSellPrice(sourceSells.get(itemId));
      const bid = bestBuyPrice(destinationBuys.get(itemId));
      if (!ask || !bid) {
        continue;
      }

      if (ask.volume < filters.minVolumeAvailable) {
        continue;
      }

      if (filters.maxInvestmentPerItem > 0 && ask.price > filters.maxInvestmentPerItem) {
        continue;
      }

      const item = items.get(itemId) ?? (await this.market.getItemInfo(itemId, signal));
      const { netProfit, marginPct } = calculateProfit(ask.price, bid.price, item.bulk, fees);

      if (!isProfitable(netProfit, marginPct, filters.minProfitMarginPct, filters.minNetProfit)) {
        continue;
      }

      opportunities.push({
        id: uuid(),
        itemId,
        itemName: item.name,
        itemBulk: item.bulk,
        sourceMarket: source.name,
        destinationMarket: destination.name,
        buyPrice: ask.price,
        sellPrice: bid.price,
        volumeAvailable: ask.volume,
        netProfitPerUnit: netProfit,
        profitMarginPct: marginPct,
        totalProfitPotential: netProfit * ask.volume
      });
    }

    return opportunities.sort(
      (a, b) => b.totalProfitPotential - a.totalProfitPotential
    );
  }
}
