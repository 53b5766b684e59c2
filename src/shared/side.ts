/**
 * OrderSide — the two sides of a limit order on a spot market.
 */

export const OrderSide = {
	Buy: "buy",
	Sell: "sell",
} as const;

export type OrderSide = (typeof OrderSide)[keyof typeof OrderSide];

/** Return the counter side (buy becomes sell and vice versa). */
export function oppositeSide(side: OrderSide): OrderSide {
	return side === OrderSide.Buy ? OrderSide.Sell : OrderSide.Buy;
}

/** Parse a venue side string case-insensitively; null when unrecognised. */
export function parseSide(raw: unknown): OrderSide | null {
	if (typeof raw !== "string") return null;
	const lowered = raw.trim().toLowerCase();
	if (lowered === OrderSide.Buy) return OrderSide.Buy;
	if (lowered === OrderSide.Sell) return OrderSide.Sell;
	return null;
}
