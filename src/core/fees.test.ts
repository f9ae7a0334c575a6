import { describe, it, expect } from '@jest/globals';
import { calculateProfit, isProfitable } from './fees.js';
import { testFees } from '../testing/fakes.js';

describe('calculateProfit', () => {
  it('nets brokerage, sales tax and transport out of the spread', () => {
    const { netProfit, marginPct } = calculateProfit(100, 150, 1, testFees);

    // cost 103, revenue 133.5, transport 10
    expect(netProfit).toBeCloseTo(20.5, 9);
    expect(marginPct).toBeCloseTo((20.5 / 103) * 100, 9);
    expect(marginPct).toBeCloseTo(19.9, 1);
  });

  it('is deterministic for fixed inputs', () => {
    const first = calculateProfit(1234.5, 2000, 3.2, testFees);
    const second = calculateProfit(1234.5, 2000, 3.2, testFees);
    expect(second).toEqual(first);
  });

  it('scales transport cost with bulk', () => {
    const light = calculateProfit(100, 150, 1, testFees);
    const heavy = calculateProfit(100, 150, 5, testFees);
    expect(light.netProfit - heavy.netProfit).toBeCloseTo(40, 9);
  });

  it('reports zero margin when the effective cost is zero', () => {
    const { netProfit, marginPct } = calculateProfit(0, 150, 1, testFees);
    expect(marginPct).toBe(0);
    expect(netProfit).toBeCloseTo(123.5, 9);
  });

  it('can be negative when fees eat the spread', () => {
    const { netProfit, marginPct } = calculateProfit(100, 110, 0, testFees);
    // 110 * 0.89 = 97.9 against a cost of 103
    expect(netProfit).toBeCloseTo(-5.1, 9);
    expect(marginPct).toBeLessThan(0);
  });
});

describe('isProfitable', () => {
  it('requires both thresholds', () => {
    expect(isProfitable(20.5, 19.9, 10, 5)).toBe(true);
    expect(isProfitable(20.5, 9.9, 10, 5)).toBe(false);
    expect(isProfitable(4.9, 19.9, 10, 5)).toBe(false);
  });

  it('accepts values equal to the thresholds', () => {
    expect(isProfitable(5, 10, 10, 5)).toBe(true);
  });
});
