/**
 * Domain primitive identifiers — branded types for compile-time safety.
 *
 * A venue-assigned order id and the caller-assigned reference id are both
 * strings on the wire; the brands keep one from being passed where the
 * other is expected (cancel-by-id vs cancel-by-userProvidedId).
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Venue-assigned order identifier, present once the order is accepted. */
export type OrderId = Brand<string, "OrderId">;
/** Caller-assigned idempotency token sent as `userProvidedId`. */
export type ClientReferenceId = Brand<string, "ClientReferenceId">;

// ── Factory functions with validation ────────────────────────────────

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated OrderId from a raw string. Throws if empty. */
export function orderId(value: string): OrderId {
	return createBrandedId(value, "OrderId");
}

/** Create a validated ClientReferenceId from a raw string. Throws if empty. */
export function clientReferenceId(value: string): ClientReferenceId {
	return createBrandedId(value, "ClientReferenceId");
}
