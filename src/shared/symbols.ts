/**
 * Market symbol and precision helpers.
 *
 * The venue speaks `BASE_QUOTE`. Every component splits symbols and rounds
 * prices/quantities through this module so rounding never diverges between
 * the engine, the sizing rules and the client.
 */

import type { Decimal } from "./decimal.js";

const DELIMITERS = ["/", "-", "_"] as const;

/** Base and quote assets of a market. */
export interface SymbolParts {
	readonly base: string;
	readonly quote: string;
}

/**
 * Splits `BTC/USDT`, `BTC-USDT` or `BTC_USDT` into its assets (upper-cased).
 * @throws Error for a symbol without a supported delimiter or with an empty side
 * @example splitSymbol("btc/usdt") // { base: "BTC", quote: "USDT" }
 */
export function splitSymbol(symbol: string): SymbolParts {
	const trimmed = symbol.trim();
	for (const delimiter of DELIMITERS) {
		const index = trimmed.indexOf(delimiter);
		if (index === -1) continue;
		const base = trimmed.slice(0, index).trim().toUpperCase();
		const quote = trimmed.slice(index + 1).trim().toUpperCase();
		if (base.length === 0 || quote.length === 0) break;
		return { base, quote };
	}
	throw new Error(`Unsupported symbol format: "${symbol}" (expected BASE_QUOTE)`);
}

/**
 * Normalizes any supported delimiter to the venue's `BASE_QUOTE` form.
 * @example normalizeSymbol("eth-btc") // "ETH_BTC"
 */
export function normalizeSymbol(symbol: string): string {
	const { base, quote } = splitSymbol(symbol);
	return `${base}_${quote}`;
}

/** Rounds a price down to the venue tick size. */
export function roundDownToTick(price: Decimal, tickSize: Decimal): Decimal {
	return price.floorTo(tickSize);
}

/** Rounds a price up to the venue tick size. */
export function roundUpToTick(price: Decimal, tickSize: Decimal): Decimal {
	return price.ceilTo(tickSize);
}

/** Rounds a quantity down to the venue lot step. */
export function roundDownToStep(quantity: Decimal, stepSize: Decimal): Decimal {
	return quantity.floorTo(stepSize);
}

/** Rounds a quantity up to the venue lot step (minimum sizes must not shrink). */
export function roundUpToStep(quantity: Decimal, stepSize: Decimal): Decimal {
	return quantity.ceilTo(stepSize);
}
