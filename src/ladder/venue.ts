import type { Balance, CancelResult, CancelTarget, CreateOrderRequest, Ticker, VenueOrder } from "../client/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { OrderId } from "../shared/identifiers.js";
import type { OrderSide } from "../shared/side.js";

/**
 * The venue operations the ladder needs. `RestClient` satisfies it;
 * tests substitute an in-memory venue.
 */
export interface LadderVenue {
	createOrder(req: CreateOrderRequest): Promise<VenueOrder>;
	cancelOrder(target: CancelTarget): Promise<CancelResult>;
	cancelAllOrders(symbol: string, side?: OrderSide): Promise<boolean>;
	getOrder(id: OrderId): Promise<VenueOrder>;
	listOpenOrders(symbol: string): Promise<VenueOrder[]>;
	getBalances(): Promise<Balance[]>;
	getMidPrice(symbol: string): Promise<Decimal>;
	getTicker(symbol: string): Promise<Ticker>;
}
