/**
 * On-disk shape of the engine state snapshot.
 *
 * Decimals are stored as plain strings so a snapshot round-trips exactly.
 */

import { z } from "../lib/validation/index.js";

const DecimalString = z.string().regex(/^-?\d+(\.\d+)?$/, "expected a plain decimal string");
const SideSchema = z.enum(["buy", "sell"]);

export const TrackedOrderSchema = z.object({
	orderId: z.string().min(1),
	clientReferenceId: z.string().min(1),
	side: SideSchema,
	price: DecimalString,
	quantity: DecimalString,
	costBasis: DecimalString.nullable(),
	createdAtMs: z.number(),
});

export const AmbiguousPlacementSchema = TrackedOrderSchema.omit({ orderId: true });

export const EngineStateSchema = z.object({
	version: z.literal(1),
	symbol: z.string().min(1),
	variant: z.enum(["bounded", "unbounded"]),
	referencePrice: DecimalString.nullable(),
	lowestBuyPrice: DecimalString.nullable(),
	highestSellPrice: DecimalString.nullable(),
	lastMid: DecimalString.nullable(),
	openOrders: z.array(TrackedOrderSchema),
	ambiguousPlacements: z.array(AmbiguousPlacementSchema).default([]),
	/** Σ sell price × quantity. Gross proceeds, not profit. */
	grossSellRevenue: DecimalString,
	/** Net of both fee legs, for sells whose buy price is known. */
	realizedNetProfit: DecimalString,
	needsRebalance: z.boolean(),
	haltedSides: z.array(SideSchema).default([]),
	isRunning: z.boolean(),
	lastError: z.string().nullable(),
	updatedAtMs: z.number(),
});

export type StoredOrder = z.infer<typeof TrackedOrderSchema>;
export type StoredAmbiguousPlacement = z.infer<typeof AmbiguousPlacementSchema>;
export type EngineState = z.infer<typeof EngineStateSchema>;
