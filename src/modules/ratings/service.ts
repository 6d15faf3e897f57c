/**
 * Rating Service.
 *
 * Propósito: única superficie para "mutar y mantener consistente" ratings + cache.
 *
 * Invariantes:
 * - Toda mutación (`recordRating`, `removeRating`) invalida la key del cache antes
 *   de devolver, también cuando la escritura falla: un cache vacío se recalcula
 *   solo en la próxima lectura.
 * - Lectura: cache → miss → `statsFor` en la DB → `put` con la generación
 *   capturada antes de ir a la DB.
 * - Un error del cache se trata como miss; la DB es la fuente de verdad.
 */
import type { ItemId, MessageId, UserId } from "@/db/types";
import { OkResult, type Result } from "@/utils/result";
import type { AggregateCache } from "./cache";
import type { RatingStore, TrackedItemStore } from "./store";
import type {
  RatingContext,
  RatingLogger,
  RatingRecord,
  RatingStats,
  TrackedItem,
} from "./types";

export interface RatingServiceDeps {
  ratings: RatingStore;
  items: TrackedItemStore;
  cache: AggregateCache;
  logger: RatingLogger;
}

export class RatingService {
  private readonly ratings: RatingStore;
  private readonly items: TrackedItemStore;
  private readonly cache: AggregateCache;
  private readonly logger: RatingLogger;

  constructor(deps: RatingServiceDeps) {
    this.ratings = deps.ratings;
    this.items = deps.items;
    this.cache = deps.cache;
    this.logger = deps.logger;
  }

  // ----------------------------- cache (fail-open) -----------------------------

  private cacheGet(itemId: ItemId, context: RatingContext): RatingStats | null {
    try {
      return this.cache.get(itemId, context);
    } catch (error) {
      this.logger.warn("[ratings] cache read failed; treating as miss", { itemId, ...context, error });
      return null;
    }
  }

  private cacheGeneration(itemId: ItemId, context: RatingContext): number | null {
    try {
      return this.cache.generation(itemId, context);
    } catch (error) {
      this.logger.warn("[ratings] cache generation lookup failed", { itemId, ...context, error });
      return null;
    }
  }

  private cachePut(
    itemId: ItemId,
    context: RatingContext,
    stats: RatingStats,
    generation: number,
  ): void {
    try {
      const stored = this.cache.put(itemId, context, stats, generation);
      if (!stored) {
        this.logger.debug("[ratings] discarded stale aggregate snapshot", { itemId, ...context, generation });
      }
    } catch (error) {
      this.logger.warn("[ratings] cache write failed", { itemId, ...context, error });
    }
  }

  /** Unconditional invalidation; never throws. */
  invalidate(itemId: ItemId, context: RatingContext): void {
    try {
      this.cache.invalidate(itemId, context);
    } catch (error) {
      this.logger.error("[ratings] cache invalidation failed", { itemId, ...context, error });
    }
  }

  // ----------------------------- read path -----------------------------

  async getStats(itemId: ItemId, context: RatingContext): Promise<Result<RatingStats>> {
    const cached = this.cacheGet(itemId, context);
    if (cached) return OkResult(cached);

    const generation = this.cacheGeneration(itemId, context);
    const res = await this.ratings.statsFor(itemId, context);
    if (res.isErr()) return res;

    // Sin generación conocida no se puede garantizar frescura: no se cachea.
    if (generation !== null) {
      this.cachePut(itemId, context, res.value, generation);
    }
    return OkResult(res.value);
  }

  /**
   * Stats for composing a summary message for the first time.
   * Same read path as `getStats`; named for the display layer that calls it.
   */
  async validateRating(itemId: ItemId, context: RatingContext): Promise<Result<RatingStats>> {
    return this.getStats(itemId, context);
  }

  getRating(
    userId: UserId,
    itemId: ItemId,
    context: RatingContext,
  ): Promise<Result<RatingRecord | null>> {
    return this.ratings.get(userId, itemId, context);
  }

  hasRated(userId: UserId, itemId: ItemId, context: RatingContext): Promise<Result<boolean>> {
    return this.ratings.hasRated(userId, itemId, context);
  }

  // ----------------------------- write path -----------------------------

  async recordRating(
    userId: UserId,
    itemId: ItemId,
    context: RatingContext,
    value: number,
  ): Promise<Result<RatingRecord>> {
    const res = await this.ratings.upsert(userId, itemId, context, value);
    this.invalidate(itemId, context);
    return res;
  }

  async removeRating(
    userId: UserId,
    itemId: ItemId,
    context: RatingContext,
    expectedValue?: number,
  ): Promise<Result<boolean>> {
    const res = await this.ratings.remove(userId, itemId, context, expectedValue);
    this.invalidate(itemId, context);
    return res;
  }

  // ----------------------------- tracked items -----------------------------

  findItem(itemId: ItemId, context: RatingContext): Promise<Result<TrackedItem | null>> {
    return this.items.find(itemId, context);
  }

  findItemByMessage(
    messageId: MessageId,
    context: RatingContext,
  ): Promise<Result<TrackedItem | null>> {
    return this.items.findByMessage(messageId, context);
  }

  claimDisplay(
    itemId: ItemId,
    context: RatingContext,
    token: string,
    postedBy: UserId | null,
  ): Promise<Result<boolean>> {
    return this.items.claim(itemId, context, token, postedBy);
  }

  releaseDisplay(itemId: ItemId, context: RatingContext, token: string): Promise<Result<boolean>> {
    return this.items.release(itemId, context, token);
  }

  attachDisplay(
    itemId: ItemId,
    context: RatingContext,
    messageId: MessageId,
    postedBy: UserId | null,
  ): Promise<Result<TrackedItem>> {
    return this.items.attachMessage(itemId, context, messageId, postedBy);
  }

  async clearDisplay(item: TrackedItem): Promise<Result<boolean>> {
    const res = await this.items.clearMessage(item.itemId, item.context);
    this.invalidate(item.itemId, item.context);
    return res;
  }

  countRatings(): Promise<Result<number>> {
    return this.ratings.countAll();
  }
}
