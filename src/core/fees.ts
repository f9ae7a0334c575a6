import { FeeConfig } from '../config.js';
import { ProfitBreakdown } from './types.js';

/**
 * Net profit per unit of buying at `buyPrice` in one market and selling at
 * `sellPrice` in another, after brokerage on both legs, sales tax on the sale
 * and transport of `bulk` units of volume.
 *
 * Margin is relative to the effective cost and is 0 when that cost is 0.
 */
export const calculateProfit = (
  buyPrice: number,
  sellPrice: number,
  bulk: number,
  fees: FeeConfig
): ProfitBreakdown => {
  const effectiveCost = buyPrice * (1 + fees.brokerFeeBuy);
  const effectiveRevenue =
    sellPrice * (1 - fees.brokerFeeSell - fees.salesTax);
  const transportCost = fees.transportCostPerBulk * bulk;

  const netProfit = effectiveRevenue - effectiveCost - transportCost;
  const marginPct = effectiveCost > 0 ? (netProfit / effectiveCost) * 100 : 0;

  return { netProfit, marginPct };
};

export const isProfitable = (
  netProfit: number,
  marginPct: number,
  minMarginPct: number,
  minNetProfit: number
): boolean => netProfit >= minNetProfit && marginPct >= minMarginPct;
