/**
 * LibDecimal — domain-agnostic wrapper around decimal.js-light.
 *
 * Provides precise decimal arithmetic without IEEE 754 float errors.
 * Domain code uses it through the shared/decimal facade and never imports
 * decimal.js-light directly.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * Creates a LibDecimal from a string, number or another LibDecimal.
	 * @throws Error if value is not finite (for numbers), empty or not numeric (for strings)
	 * @example LibDecimal.from("90000.5")
	 */
	static from(value: string | number | LibDecimal): LibDecimal {
		if (value instanceof LibDecimal) return value;
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		try {
			return new LibDecimal(new DecimalLight(trimmed));
		} catch {
			throw new Error(`LibDecimal.from: invalid decimal "${trimmed}"`);
		}
	}

	/**
	 * Parses a loosely-typed venue field; returns null for absent, empty or
	 * non-numeric values instead of throwing.
	 * @example LibDecimal.parse(payload["price"]) // LibDecimal | null
	 */
	static parse(value: unknown): LibDecimal | null {
		if (typeof value === "number") {
			return Number.isFinite(value) ? LibDecimal.from(value) : null;
		}
		if (typeof value !== "string" || value.trim().length === 0) return null;
		try {
			return LibDecimal.from(value);
		} catch {
			return null;
		}
	}

	static zero(): LibDecimal {
		return new LibDecimal(new DecimalLight(0));
	}

	static one(): LibDecimal {
		return new LibDecimal(new DecimalLight(1));
	}

	static min(a: LibDecimal, b: LibDecimal): LibDecimal {
		return a.lte(b) ? a : b;
	}

	static max(a: LibDecimal, b: LibDecimal): LibDecimal {
		return a.gte(b) ? a : b;
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: LibDecimal | string | number): LibDecimal {
		return new LibDecimal(this.raw.plus(LibDecimal.from(other).raw));
	}

	sub(other: LibDecimal | string | number): LibDecimal {
		return new LibDecimal(this.raw.minus(LibDecimal.from(other).raw));
	}

	mul(other: LibDecimal | string | number): LibDecimal {
		return new LibDecimal(this.raw.times(LibDecimal.from(other).raw));
	}

	/**
	 * Divides this value by another (immutable).
	 * @throws Error if dividing by zero
	 */
	div(other: LibDecimal | string | number): LibDecimal {
		const divisor = LibDecimal.from(other);
		if (divisor.raw.isZero()) {
			throw new Error("LibDecimal.div: division by zero");
		}
		return new LibDecimal(this.raw.dividedBy(divisor.raw));
	}

	neg(): LibDecimal {
		return new LibDecimal(this.raw.negated());
	}

	abs(): LibDecimal {
		return new LibDecimal(this.raw.absoluteValue());
	}

	// ── Quantization ───────────────────────────────────────────────

	/**
	 * Rounds down to the nearest multiple of `increment` (floor, toward -∞).
	 * A non-positive increment returns the value unchanged.
	 * @example LibDecimal.from("1.2345").floorTo("0.01") // "1.23"
	 */
	floorTo(increment: LibDecimal | string | number): LibDecimal {
		const inc = LibDecimal.from(increment);
		if (!inc.isPositive()) return this;
		const units = this.raw.dividedBy(inc.raw).toDecimalPlaces(0, DecimalLight.ROUND_FLOOR);
		return new LibDecimal(units.times(inc.raw));
	}

	/**
	 * Rounds up to the nearest multiple of `increment` (ceil, toward +∞).
	 * @example LibDecimal.from("1.231").ceilTo("0.01") // "1.24"
	 */
	ceilTo(increment: LibDecimal | string | number): LibDecimal {
		const inc = LibDecimal.from(increment);
		if (!inc.isPositive()) return this;
		const units = this.raw.dividedBy(inc.raw).toDecimalPlaces(0, DecimalLight.ROUND_CEIL);
		return new LibDecimal(units.times(inc.raw));
	}

	// ── Comparison ─────────────────────────────────────────────────

	/** @returns -1 if this < other, 0 if equal, 1 if this > other */
	cmp(other: LibDecimal): -1 | 0 | 1 {
		const c = this.raw.comparedTo(other.raw);
		return c < 0 ? -1 : c > 0 ? 1 : 0;
	}

	eq(other: LibDecimal): boolean {
		return this.raw.equals(other.raw);
	}

	gt(other: LibDecimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	gte(other: LibDecimal): boolean {
		return this.raw.greaterThanOrEqualTo(other.raw);
	}

	lt(other: LibDecimal): boolean {
		return this.raw.lessThan(other.raw);
	}

	lte(other: LibDecimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Plain notation without trailing zeros.
	 * @example LibDecimal.from("1.500").toString() // "1.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	/** JSON form is the plain string, so snapshots round-trip exactly. */
	toJSON(): string {
		return this.toString();
	}

	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	/** Converts to a JavaScript number. Use for logging and metrics only. */
	toNumber(): number {
		return this.raw.toNumber();
	}
}
