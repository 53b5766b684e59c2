/**
 * Order quantity rules: side-specific sizing, lot-step rounding and the
 * minimum-notional bump.
 */

import { Decimal } from "../shared/decimal.js";
import { ConfigurationError } from "../shared/errors.js";
import { OrderSide } from "../shared/side.js";
import { roundDownToStep, roundUpToStep } from "../shared/symbols.js";
import { SizingMode, SkipReason } from "./types.js";
import type { LadderConfig } from "./types.js";

/** Each bump multiplies the quantity by this factor. */
const NOTIONAL_BUMP = Decimal.from("1.05");
const MAX_NOTIONAL_BUMPS = 5;

export type QuantityDecision =
	| { readonly ok: true; readonly quantity: Decimal }
	| { readonly ok: false; readonly reason: SkipReason; readonly detail: string };

/**
 * Starting quantity for one side before rounding.
 * Dynamic modes divide the quote target (default `baseOrderSize × referencePrice`) by `price`.
 */
export function baseQuantity(
	config: LadderConfig,
	side: OrderSide,
	price: Decimal,
	referencePrice: Decimal | null,
): Decimal {
	const mode = side === OrderSide.Buy ? config.buySizingMode : config.sellSizingMode;
	if (mode === SizingMode.Fixed) return config.baseOrderSize;

	const target = config.targetQuotePerOrder ?? (referencePrice !== null ? config.baseOrderSize.mul(referencePrice) : null);
	if (target === null) {
		throw new ConfigurationError("targetQuotePerOrder or a reference price is required for dynamic sizing");
	}
	const quantity = target.div(price);
	if (mode === SizingMode.Hybrid) {
		if (config.minBaseOrderQty === undefined) {
			throw new ConfigurationError("minBaseOrderQty is required for hybrid sizing");
		}
		return Decimal.max(quantity, roundUpToStep(config.minBaseOrderQty, config.stepSize));
	}
	return quantity;
}

/**
 * Resolves the quantity to send at `price`:
 * at least `minNotional × (1 + feeBuffer) / price`, rounded down to the lot
 * step, then bumped ×1.05 (up to 5 times) while still under the minimum notional.
 */
export function resolveQuantity(config: LadderConfig, price: Decimal, start: Decimal): QuantityDecision {
	if (!price.isPositive()) {
		return { ok: false, reason: SkipReason.InvalidPrice, detail: `price ${price.toString()} is not positive` };
	}
	const minForNotional = config.minNotionalQuote.mul(Decimal.one().add(config.feeBufferPct)).div(price);
	let quantity = roundDownToStep(Decimal.max(start, minForNotional), config.stepSize);

	for (let bumps = 0; bumps < MAX_NOTIONAL_BUMPS && price.mul(quantity).lt(config.minNotionalQuote); bumps++) {
		quantity = roundDownToStep(quantity.mul(NOTIONAL_BUMP), config.stepSize);
	}

	if (!quantity.isPositive()) {
		return { ok: false, reason: SkipReason.InvalidQuantity, detail: "quantity rounds to zero" };
	}
	if (config.minOrderQty !== undefined && quantity.lt(config.minOrderQty)) {
		return {
			ok: false,
			reason: SkipReason.BelowMinQuantity,
			detail: `${quantity.toString()} < ${config.minOrderQty.toString()}`,
		};
	}
	const notional = price.mul(quantity);
	if (notional.lt(config.minNotionalQuote)) {
		return {
			ok: false,
			reason: SkipReason.BelowMinNotional,
			detail: `${notional.toString()} < ${config.minNotionalQuote.toString()}`,
		};
	}
	return { ok: true, quantity };
}
