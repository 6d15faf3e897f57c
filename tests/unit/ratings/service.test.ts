/**
 * Unit Tests: Rating service
 *
 * Purpose: cache-aside reads, invalidation on every write (even failed ones) and
 * fail-open behaviour when the cache itself breaks.
 */
import { describe, expect, it } from "vitest";
import { AggregationCache, type AggregateCache } from "@/modules/ratings/cache";
import { RatingService } from "@/modules/ratings/service";
import type { RatingContext, RatingStats } from "@/modules/ratings/types";
import type { Result } from "@/utils/result";
import {
  CONTEXT,
  InMemoryRatingStore,
  InMemoryTrackedItemStore,
  RecordingLogger,
  expectOk,
} from "../../_utils/fakes";

function setup(cache: AggregateCache = new AggregationCache({ ttlMs: 60_000 })) {
  const ratings = new InMemoryRatingStore();
  const items = new InMemoryTrackedItemStore();
  const logger = new RecordingLogger();
  const service = new RatingService({ ratings, items, cache, logger });
  return { ratings, items, logger, service, cache };
}

describe("RatingService.getStats", () => {
  it("computes on a miss and serves the cached aggregate afterwards", async () => {
    const { ratings, service } = setup();
    ratings.seed("user-1", "tt1", CONTEXT, 6);
    ratings.seed("user-2", "tt1", CONTEXT, 9);

    const first = await service.getStats("tt1", CONTEXT);
    const second = await service.getStats("tt1", CONTEXT);

    expect(expectOk(first)).toEqual({ average: 7.5, count: 2, ratingValues: [6, 9] });
    expect(expectOk(second)).toEqual({ average: 7.5, count: 2, ratingValues: [6, 9] });
    expect(ratings.calls.statsFor).toBe(1);
  });

  it("propagates a store failure", async () => {
    const { ratings, service } = setup();
    ratings.failing.add("statsFor");
    const res = await service.getStats("tt1", CONTEXT);
    expect(res.isErr()).toBe(true);
  });

  it("does not cache a snapshot read before a concurrent invalidation", async () => {
    const cache = new AggregationCache({ ttlMs: 60_000 });
    const { ratings, service } = setup(cache);
    ratings.seed("user-1", "tt1", CONTEXT, 5);

    const original = ratings.statsFor.bind(ratings);
    ratings.statsFor = async (itemId: string, context: RatingContext): Promise<Result<RatingStats>> => {
      const res = await original(itemId, context);
      cache.invalidate(itemId, context);
      return res;
    };

    const res = await service.getStats("tt1", CONTEXT);
    expect(expectOk(res).average).toBe(5);
    expect(cache.size).toBe(0);
  });

  it("treats a throwing cache as a miss", async () => {
    const broken: AggregateCache = {
      get: () => {
        throw new Error("cache down");
      },
      put: () => {
        throw new Error("cache down");
      },
      invalidate: () => {
        throw new Error("cache down");
      },
      generation: () => 0,
      sweepExpired: () => 0,
    };
    const { ratings, service, logger } = setup(broken);
    ratings.seed("user-1", "tt1", CONTEXT, 8);

    const res = await service.getStats("tt1", CONTEXT);

    expect(expectOk(res)).toEqual({ average: 8, count: 1, ratingValues: [8] });
    expect(logger.messages("warn")).toEqual([
      "[ratings] cache read failed; treating as miss",
      "[ratings] cache write failed",
    ]);
  });
});

describe("RatingService writes", () => {
  it("recordRating invalidates so the next read sees the new value", async () => {
    const { service } = setup();
    await service.recordRating("user-1", "tt1", CONTEXT, 4);
    expect(expectOk(await service.getStats("tt1", CONTEXT)).average).toBe(4);

    await service.recordRating("user-1", "tt1", CONTEXT, 9);
    expect(expectOk(await service.getStats("tt1", CONTEXT))).toEqual({
      average: 9,
      count: 1,
      ratingValues: [9],
    });
  });

  it("invalidates even when the write fails", async () => {
    const { ratings, service, cache } = setup();
    await service.getStats("tt1", CONTEXT);
    expect(cache.generation("tt1", CONTEXT)).toBe(0);

    ratings.failing.add("upsert");
    const res = await service.recordRating("user-1", "tt1", CONTEXT, 4);

    expect(res.isErr()).toBe(true);
    expect(cache.generation("tt1", CONTEXT)).toBe(1);
    expect(cache.get("tt1", CONTEXT)).toBeNull();
  });

  it("removeRating honours the expected value", async () => {
    const { ratings, service } = setup();
    ratings.seed("user-1", "tt1", CONTEXT, 7);

    expect(expectOk(await service.removeRating("user-1", "tt1", CONTEXT, 3))).toBe(false);
    expect(ratings.rows.size).toBe(1);
    expect(expectOk(await service.removeRating("user-1", "tt1", CONTEXT, 7))).toBe(true);
    expect(ratings.rows.size).toBe(0);
  });

  it("removeRating invalidates before returning", async () => {
    const { ratings, service, cache } = setup();
    ratings.seed("user-1", "tt1", CONTEXT, 9);
    ratings.seed("user-2", "tt1", CONTEXT, 5);
    await service.getStats("tt1", CONTEXT);

    await service.removeRating("user-1", "tt1", CONTEXT, 9);

    expect(cache.get("tt1", CONTEXT)).toBeNull();
    expect(expectOk(await service.getStats("tt1", CONTEXT))).toEqual({ average: 5, count: 1, ratingValues: [5] });
  });

  it("removing an absent rating is a successful no-op", async () => {
    const { service } = setup();
    const res = await service.removeRating("user-1", "tt1", CONTEXT);
    expect(res.isOk()).toBe(true);
    expect(expectOk(res)).toBe(false);
  });

  it("clearDisplay drops the message reference", async () => {
    const { items, service } = setup();
    const item = items.seed("tt1", CONTEXT, "summary-msg");

    expect(expectOk(await service.clearDisplay(item))).toBe(true);
    expect(expectOk(await service.findItem("tt1", CONTEXT))?.messageId).toBeNull();
    expect(expectOk(await service.findItemByMessage("summary-msg", CONTEXT))).toBeNull();
  });
});
