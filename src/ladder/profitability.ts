/**
 * Fee-aware profitability rules for a buy/sell pair one step apart.
 *
 * A round trip buys at `b` paying `fee` and sells at `s` paying `fee`, and
 * must clear an extra `buffer` on the sell side:
 *
 *   s × (1 − fee − buffer) ≥ b × (1 + fee)
 *
 * so the smallest profitable relative step is `(1 + fee) / (1 − fee − buffer) − 1`.
 */

import { Decimal } from "../shared/decimal.js";
import { ConfigurationError } from "../shared/errors.js";
import { StepMode } from "./types.js";
import type { LadderConfig } from "./types.js";

/**
 * Minimum relative spacing that breaks even after fees and buffer.
 * @example minProfitableStep(Decimal.from("0.002"), Decimal.from("0.0001")) // ≈ 0.0042
 */
export function minProfitableStep(totalFeeRate: Decimal, feeBufferPct: Decimal): Decimal {
	const one = Decimal.one();
	return one.add(totalFeeRate).div(one.sub(totalFeeRate).sub(feeBufferPct)).sub(one);
}

/** Lowest sell price that recovers a buy at `buyPrice`. */
export function minProfitableSellPrice(buyPrice: Decimal, totalFeeRate: Decimal, feeBufferPct: Decimal): Decimal {
	const one = Decimal.one();
	return buyPrice.mul(one.add(totalFeeRate)).div(one.sub(totalFeeRate).sub(feeBufferPct));
}

export function isProfitablePair(
	buyPrice: Decimal,
	sellPrice: Decimal,
	totalFeeRate: Decimal,
	feeBufferPct: Decimal,
): boolean {
	return sellPrice.gte(minProfitableSellPrice(buyPrice, totalFeeRate, feeBufferPct));
}

/** Net quote proceeds of buying then selling `quantity`, both legs charged `totalFeeRate`. */
export function roundTripProfit(
	buyPrice: Decimal,
	sellPrice: Decimal,
	quantity: Decimal,
	totalFeeRate: Decimal,
): Decimal {
	const one = Decimal.one();
	const cost = buyPrice.mul(quantity).mul(one.add(totalFeeRate));
	const revenue = sellPrice.mul(quantity).mul(one.sub(totalFeeRate));
	return revenue.sub(cost);
}

/** The configured step as a fraction of `referencePrice`. */
export function relativeStep(config: LadderConfig, referencePrice: Decimal): Decimal {
	if (config.stepMode === StepMode.Pct) {
		if (config.stepPct === undefined) {
			throw new ConfigurationError("stepPct is required when stepMode is pct");
		}
		return config.stepPct;
	}
	if (config.stepAbs === undefined) {
		throw new ConfigurationError("stepAbs is required when stepMode is abs");
	}
	return config.stepAbs.div(referencePrice);
}

/**
 * Refuses a ladder whose spacing cannot pay its fees.
 * @throws ConfigurationError when the step is below {@link minProfitableStep}
 */
export function assertProfitableSpacing(config: LadderConfig, referencePrice: Decimal): void {
	if (!referencePrice.isPositive()) {
		throw new ConfigurationError("Reference price must be positive", {
			referencePrice: referencePrice.toString(),
		});
	}
	const minimum = minProfitableStep(config.totalFeeRate, config.feeBufferPct);
	const step = relativeStep(config, referencePrice);
	if (step.lt(minimum)) {
		throw new ConfigurationError(
			`Grid spacing too small to be profitable after fees: step=${step.mul(100).toFixed(4)}% < min=${minimum.mul(100).toFixed(4)}%`,
			{
				step: step.toString(),
				minProfitableStep: minimum.toString(),
				totalFeeRate: config.totalFeeRate.toString(),
				feeBufferPct: config.feeBufferPct.toString(),
			},
		);
	}
}
