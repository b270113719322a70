// src/adapters/opinion/types.ts
// Opinion venue wire types for WebSocket frames and REST responses

import { z } from "zod";

/**
 * Outbound subscription frame
 * Exactly one of marketId / rootMarketId is present.
 */
export type OpinionSubscribeFrame =
  | { action: "SUBSCRIBE" | "UNSUBSCRIBE"; channel: string; marketId: number }
  | { action: "SUBSCRIBE" | "UNSUBSCRIBE"; channel: string; rootMarketId: number };

export interface OpinionHeartbeatFrame {
  action: "HEARTBEAT";
}

const LooseNumeric = z.union([z.string(), z.number()]).nullish();

/**
 * Market as returned by GET /markets (initial snapshot).
 * Every field is optional on the wire; normalizers decide what is usable.
 */
export const OpinionMarketSchema = z
  .object({
    id: z.union([z.number(), z.string()]).optional(),
    marketId: z.union([z.number(), z.string()]).optional(),
    question: z.string().nullish(),
    title: z.string().nullish(),
    description: z.string().nullish(),
    endDate: z.union([z.string(), z.number()]).nullish(),
    createdAt: z.union([z.string(), z.number()]).nullish(),
    outcomeType: z.string().nullish(),
    volume: LooseNumeric,
    lastPrice: LooseNumeric,
    yesPrice: LooseNumeric,
    noPrice: LooseNumeric,
    liquidity: LooseNumeric,
    categories: z.array(z.unknown()).nullish(),
    slug: z.string().nullish(),
  })
  .passthrough();

export type OpinionMarket = z.infer<typeof OpinionMarketSchema>;

export const OpinionMarketsPageSchema = z.object({
  markets: z.array(z.unknown()).optional().default([]),
  total: z.number().optional(),
});

export type OpinionMarketsPage = z.infer<typeof OpinionMarketsPageSchema>;
