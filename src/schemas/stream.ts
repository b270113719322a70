// src/schemas/stream.ts
// Zod schemas for inbound WebSocket frames

import { z } from "zod";

/**
 * Non-negative decimal as the venue sends it: "0.85", "100", "8.5"
 */
export const DecimalStringSchema = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "expected a non-negative decimal string")
  .refine((v) => Number.isFinite(Number(v)), "decimal out of range");

const MarketIdNumberSchema = z.number().int().positive().safe();

/**
 * Numeric id, also accepted as a canonical integer string ("2764")
 */
export const MarketIdSchema = z.union([
  MarketIdNumberSchema,
  z
    .string()
    .regex(/^[1-9]\d*$/, "expected a positive integer")
    .transform(Number)
    .pipe(MarketIdNumberSchema),
]);

const FrameBaseSchema = z.object({
  marketId: MarketIdSchema,
  tokenId: z.string().min(1),
  outcomeSide: z.union([z.literal(1), z.literal(2)]),
});

const TradeSideSchema = z
  .string()
  .transform((v) => v.toLowerCase())
  .pipe(z.enum(["buy", "sell"]))
  .transform((v) => (v === "buy" ? "Buy" : "Sell"));

const DepthSideSchema = z
  .string()
  .transform((v) => v.toLowerCase())
  .pipe(z.enum(["bids", "asks"]));

export const LastPriceFrameSchema = FrameBaseSchema.extend({
  msgType: z.literal("market.last.price"),
  price: DecimalStringSchema,
});

export const LastTradeFrameSchema = FrameBaseSchema.extend({
  msgType: z.literal("market.last.trade"),
  side: TradeSideSchema,
  price: DecimalStringSchema,
  shares: DecimalStringSchema,
  amount: DecimalStringSchema,
});

export const DepthDiffFrameSchema = FrameBaseSchema.extend({
  msgType: z.literal("market.depth.diff"),
  side: DepthSideSchema,
  price: DecimalStringSchema,
  size: DecimalStringSchema,
});

export const InboundFrameSchema = z.discriminatedUnion("msgType", [
  LastPriceFrameSchema,
  LastTradeFrameSchema,
  DepthDiffFrameSchema,
]);

export const KNOWN_MSG_TYPES: ReadonlySet<string> = new Set(
  InboundFrameSchema.options.map((option) => option.shape.msgType.value)
);

export type InboundFrame = z.infer<typeof InboundFrameSchema>;
