import { BestPrice, Order, OrdersByItem, SplitOrderBook } from './types.js';

const append = (map: OrdersByItem, order: Order): void => {
  const existing = map.get(order.itemId);
  if (existing) {
    existing.push(order);
  } else {
    map.set(order.itemId, [order]);
  }
};

export const splitBySide = (orders: readonly Order[]): SplitOrderBook => {
  const sells: OrdersByItem = new Map();
  const buys: OrdersByItem = new Map();

  for (const order of orders) {
    append(order.side === 'buy' ? buys : sells, order);
  }

  return { sells, buys };
};

/** Lowest ask for one item, with the volume resting at that order. */
export const bestSellPrice = (
  orders: readonly Order[] | undefined
): BestPrice | undefined => {
  if (!orders?.length) {
    return undefined;
  }
  const [best] = [...orders].sort((a, b) => a.price - b.price);
  return { price: best.price, volume: best.volumeRemain };
};

/** Highest bid for one item, with the volume resting at that order. */
export const bestBuyPrice = (
  orders: readonly Order[] | undefined
): BestPrice | undefined => {
  if (!orders?.length) {
    return undefined;
  }
  const [best] = [...orders].sort((a, b) => b.price - a.price);
  return { price: best.price, volume: best.volumeRemain };
};
