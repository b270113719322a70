// src/schemas/topics.ts
// Topic-related Zod schemas for API validation

import { z } from "zod";
import { OUTCOME_TYPES } from "../core/enums";
import { SORT_FIELDS } from "../services/topic-query";

// ============================================================
// Query-string helpers
// ============================================================

const intParam = z
  .string()
  .regex(/^-?\d+$/, "expected an integer")
  .transform((v) => parseInt(v, 10));

const booleanParam = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const isoDateParam = z.string().refine((v) => !Number.isNaN(Date.parse(v)), {
  message: "expected an ISO 8601 date",
});

// Price bounds arrive as numbers or decimal strings ("0.5")
const numericBound = z.union([
  z.number(),
  z
    .string()
    .regex(/^-?\d+(\.\d+)?$/, "expected a number")
    .transform((v) => Number(v)),
]);

// ============================================================
// GET /topics
// ============================================================

export const TopicListQuerySchema = z.object({
  limit: intParam.pipe(z.number().int().min(1)).optional(),
  offset: intParam.pipe(z.number().int().min(0)).optional(),
  end_date_before: isoDateParam.optional(),
  end_date_after: isoDateParam.optional(),
  order_by: z.enum(SORT_FIELDS).optional(),
  order: z.enum(["asc", "desc"]).optional(),
});

export type TopicListQuery = z.infer<typeof TopicListQuerySchema>;

// ============================================================
// GET /topics/search
// ============================================================

export const TopicSearchQuerySchema = z.object({
  q: z.string().trim().min(1),
  limit: intParam.pipe(z.number().int().min(1).max(100)).optional(),
  fuzzy: booleanParam.optional().default("true"),
});

export type TopicSearchQuery = z.infer<typeof TopicSearchQuerySchema>;

// ============================================================
// POST /topics/filter
// ============================================================

const RangeSchema = z
  .object({
    min: numericBound.optional(),
    max: numericBound.optional(),
  })
  .strict();

export const TopicFiltersSchema = z
  .object({
    end_date_range: z
      .object({
        start: isoDateParam.optional(),
        end: isoDateParam.optional(),
      })
      .strict()
      .optional(),
    outcome_types: z.array(z.enum(OUTCOME_TYPES)).optional(),
    categories: z.array(z.string()).optional(),
    keywords: z.array(z.string()).optional(),
    exclude_keywords: z.array(z.string()).optional(),
    price_range: RangeSchema.optional(),
    volume_range: RangeSchema.optional(),
    min_volume: z.number().optional(),
    max_volume: z.number().optional(),
    created_after: isoDateParam.optional(),
  })
  .strict();

export const TopicFilterBodySchema = z
  .object({
    filters: TopicFiltersSchema.optional(),
    sort: z
      .object({
        field: z.enum(SORT_FIELDS).optional(),
        order: z.enum(["asc", "desc"]).optional(),
      })
      .strict()
      .optional(),
    pagination: z
      .object({
        limit: z.number().int().min(1).optional(),
        offset: z.number().int().min(0).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type TopicFilterBody = z.infer<typeof TopicFilterBodySchema>;

// ============================================================
// GET /topics/:id
// ============================================================

export const TopicIdParamSchema = z.object({
  id: z.string().min(1),
});
