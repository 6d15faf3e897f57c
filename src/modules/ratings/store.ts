/**
 * Persistence contracts for the ratings engine.
 *
 * The engine only talks to these interfaces; `src/db/repositories` provides the
 * Mongo implementations and the tests provide in-memory ones.
 */
import type { ItemId, MessageId, UserId } from "@/db/types";
import type { Result } from "@/utils/result";
import type { RatingContext, RatingRecord, RatingStats, TrackedItem } from "./types";

export interface RatingStore {
  hasRated(userId: UserId, itemId: ItemId, context: RatingContext): Promise<Result<boolean>>;

  get(userId: UserId, itemId: ItemId, context: RatingContext): Promise<Result<RatingRecord | null>>;

  /**
   * Insert-or-update keyed by (user, item, context). Must be atomic with respect to
   * that key: concurrent upserts never produce two rows and the last write wins.
   */
  upsert(
    userId: UserId,
    itemId: ItemId,
    context: RatingContext,
    value: number,
  ): Promise<Result<RatingRecord>>;

  /**
   * Removing an absent rating is a successful no-op (`Ok(false)`).
   * With `expectedValue` the row is only deleted while it still holds that value.
   */
  remove(
    userId: UserId,
    itemId: ItemId,
    context: RatingContext,
    expectedValue?: number,
  ): Promise<Result<boolean>>;

  /** Authoritative aggregate over every current rating of the group. */
  statsFor(itemId: ItemId, context: RatingContext): Promise<Result<RatingStats>>;

  countAll(): Promise<Result<number>>;
}

export interface TrackedItemStore {
  find(itemId: ItemId, context: RatingContext): Promise<Result<TrackedItem | null>>;

  findByMessage(messageId: MessageId, context: RatingContext): Promise<Result<TrackedItem | null>>;

  /**
   * Reserves the (item, context) slot for one publisher before anything is posted.
   * `Ok(true)` only while no summary is attached and no live claim is held; a
   * claim ends with `attachMessage` or `release`, or when it goes stale.
   */
  claim(
    itemId: ItemId,
    context: RatingContext,
    token: string,
    postedBy: UserId | null,
  ): Promise<Result<boolean>>;

  /** Drops the claim if `token` still holds it. */
  release(itemId: ItemId, context: RatingContext, token: string): Promise<Result<boolean>>;

  /**
   * Creates the record or re-attaches a display message to an existing one, ending
   * any claim on it. Returns the stored item after the write.
   */
  attachMessage(
    itemId: ItemId,
    context: RatingContext,
    messageId: MessageId,
    postedBy: UserId | null,
  ): Promise<Result<TrackedItem>>;

  /** Clears the display reference; the record itself is kept. */
  clearMessage(itemId: ItemId, context: RatingContext): Promise<Result<boolean>>;
}

/** Rounds to one decimal the way the summary shows it (`7.25` → `7.3`). */
export const roundToTenth = (value: number): number => Math.round(value * 10) / 10;

/**
 * Canonical aggregate computation shared by every `RatingStore`.
 * Empty input yields `{ average: 0, count: 0 }`.
 */
export function summarizeRatings(values: readonly number[]): RatingStats {
  if (values.length === 0) {
    return { average: 0, count: 0, ratingValues: [] };
  }
  const total = values.reduce((acc, value) => acc + value, 0);
  return {
    average: roundToTenth(total / values.length),
    count: values.length,
    ratingValues: [...values],
  };
}
