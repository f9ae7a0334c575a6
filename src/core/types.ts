export type OrderSide = 'buy' | 'sell';

export interface Order {
  orderId: number;
  itemId: number;
  price: number;
  volumeRemain: number;
  side: OrderSide;
  marketId: number;
  locationId: number;
}

/** item id → resting orders for that item on one side of the book */
export type OrdersByItem = Map<number, Order[]>;

export interface SplitOrderBook {
  sells: OrdersByItem;
  buys: OrdersByItem;
}

export interface BestPrice {
  price: number;
  volume: number;
}

export interface ItemInfo {
  name: string;
  bulk: number;
}

export interface ItemSearchResult {
  itemId: number;
  name: string;
}

export interface CachedPage {
  marketId: number;
  page: number;
  totalPages: number;
  fetchedAt: number;
  orders: Order[];
}

export interface OrdersPage {
  orders: Order[];
  totalPages: number;
}

export interface MarketRef {
  name: string;
  id: number;
}

export interface Route {
  source: string;
  destination: string;
}

export interface Opportunity {
  id: string;
  itemId: number;
  itemName: string;
  itemBulk: number;
  sourceMarket: string;
  destinationMarket: string;
  buyPrice: number;
  sellPrice: number;
  volumeAvailable: number;
  netProfitPerUnit: number;
  profitMarginPct: number;
  totalProfitPotential: number;
}

export interface StoredOpportunity extends Opportunity {
  scanId: string;
  scannedAt: number;
}

export interface ProfitBreakdown {
  netProfit: number;
  marginPct: number;
}

export interface RouteFailure {
  route: Route;
  code: string;
  reason: string;
}

export interface RouteSkip {
  route: Route;
  reason: string;
}

export interface ScanSummary {
  scanId: string;
  startedAt: number;
  finishedAt: number;
  attempted: number;
  succeeded: number;
  failed: number;
  skipped: RouteSkip[];
  failures: RouteFailure[];
  opportunityCount: number;
}

export const routeLabel = (route: Route): string =>
  `${route.source}->${route.destination}`;
