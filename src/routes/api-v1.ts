// src/routes/api-v1.ts
// Topic query routes with Zod validation

import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import { InvalidFieldError } from "../errors";
import type { AppEnv } from "../middleware/response-wrapper";
import {
  TopicFilterBodySchema,
  TopicIdParamSchema,
  TopicListQuerySchema,
  TopicSearchQuerySchema,
  type TopicFilterBody,
} from "../schemas/topics";
import type { NumericRange, QueryEngine, TopicFilter } from "../services/topic-query";

export interface ApiV1Dependencies {
  query: QueryEngine;
}

/**
 * Filter body → engine filter.
 * Accepts the flat min_volume / max_volume form alongside volume_range.
 */
export function toTopicFilter(filters: TopicFilterBody["filters"]): TopicFilter {
  if (!filters) return {};
  const { min_volume, max_volume, volume_range, ...rest } = filters;

  let volumeRange: NumericRange | undefined = volume_range;
  if (!volumeRange && (min_volume !== undefined || max_volume !== undefined)) {
    volumeRange = { min: min_volume, max: max_volume };
  }

  return { ...rest, volume_range: volumeRange };
}

export function createApiV1({ query }: ApiV1Dependencies) {
  const apiV1 = new Hono<AppEnv>();

  // ============================================================
  // Topic Routes
  // ============================================================

  // GET /topics - list with date window and sort
  apiV1.get(
    "/topics",
    zValidator("query", TopicListQuerySchema, (result) => {
      if (!result.success) {
        throw new InvalidFieldError("query", result.error.issues, "valid query parameters");
      }
    }),
    (c) => {
      const { limit, offset, end_date_before, end_date_after, order_by, order } = c.req.valid("query");

      const endDateRange =
        end_date_before !== undefined || end_date_after !== undefined
          ? { start: end_date_after, end: end_date_before }
          : undefined;

      const page = query.list(
        { end_date_range: endDateRange },
        { field: order_by, order },
        { limit, offset }
      );
      return c.json(page);
    }
  );

  // GET /topics/search - keyword search
  // Must be defined BEFORE /topics/:id to avoid route collision
  apiV1.get(
    "/topics/search",
    zValidator("query", TopicSearchQuerySchema, (result) => {
      if (!result.success) {
        throw new InvalidFieldError("q", result.error.issues, "non-empty search query");
      }
    }),
    (c) => {
      const { q, limit, fuzzy } = c.req.valid("query");
      const items = query.search(q, limit, fuzzy);
      return c.json({
        items,
        total: items.length,
        limit: query.resolveSearchLimit(limit),
        offset: 0,
      });
    }
  );

  // POST /topics/filter - advanced filter
  apiV1.post(
    "/topics/filter",
    zValidator("json", TopicFilterBodySchema, (result) => {
      if (!result.success) {
        throw new InvalidFieldError("body", result.error.issues, "valid filter request");
      }
    }),
    (c) => {
      const body = c.req.valid("json");
      const page = query.list(toTopicFilter(body.filters), body.sort ?? {}, body.pagination ?? {});
      return c.json(page);
    }
  );

  // GET /topics/:id - single topic
  apiV1.get(
    "/topics/:id",
    zValidator("param", TopicIdParamSchema, (result) => {
      if (!result.success) {
        throw new InvalidFieldError("id", result.error.issues, "topic id");
      }
    }),
    (c) => {
      const { id } = c.req.valid("param");
      const result = query.getById(id);
      if (!result.ok) {
        throw result.error;
      }
      return c.json(result.topic);
    }
  );

  return apiV1;
}
