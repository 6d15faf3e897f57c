/**
 * Rating Engine.
 *
 * Propósito: construir y poseer explícitamente los componentes con estado
 * (guard, cache) en lugar de singletons de módulo. Se crea en el bootstrap,
 * `start()` en `botReady`, `stop()` al apagar; los tests crean una instancia
 * aislada por caso.
 */
import type { ItemId, UserId } from "@/db/types";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { AggregationCache } from "./cache";
import { SelfActionGuard } from "./guard";
import type { ItemLink } from "./links";
import { RatingEventRouter } from "./router";
import { RatingService } from "./service";
import type { RatingStore, TrackedItemStore } from "./store";
import type {
  PublishOutcome,
  RatingContext,
  RatingLogger,
  RatingStats,
  ReactionGateway,
  SummaryDisplay,
  TrackedItem,
} from "./types";
import type { RatingsConfig } from "@/configuration/env";

export type RatingEngineTuning = Pick<
  RatingsConfig,
  "cacheTtlMs" | "cacheSweepMs" | "guardCooldownMs" | "noticeTtlMs"
>;

export interface RatingEngineDeps {
  config: RatingEngineTuning;
  ratings: RatingStore;
  items: TrackedItemStore;
  gateway: ReactionGateway;
  display: SummaryDisplay;
  logger: RatingLogger;
  now?: () => number;
}

export interface RatingEngineSnapshot {
  running: boolean;
  uptimeMs: number;
  cachedAggregates: number;
  guardMarkers: number;
}

export class RatingEngine {
  readonly guard: SelfActionGuard;
  readonly cache: AggregationCache;
  readonly service: RatingService;
  readonly router: RatingEventRouter;

  private readonly display: SummaryDisplay;
  private readonly logger: RatingLogger;
  private readonly now: () => number;
  private startedAt: number | null = null;
  private claimSeq = 0;

  constructor(deps: RatingEngineDeps) {
    this.now = deps.now ?? Date.now;
    this.display = deps.display;
    this.logger = deps.logger;

    this.guard = new SelfActionGuard({
      cooldownMs: deps.config.guardCooldownMs,
      now: this.now,
    });
    this.cache = new AggregationCache({
      ttlMs: deps.config.cacheTtlMs,
      sweepIntervalMs: deps.config.cacheSweepMs,
      now: this.now,
    });
    this.service = new RatingService({
      ratings: deps.ratings,
      items: deps.items,
      cache: this.cache,
      logger: deps.logger,
    });
    this.router = new RatingEventRouter({
      service: this.service,
      guard: this.guard,
      gateway: deps.gateway,
      display: deps.display,
      logger: deps.logger,
      noticeTtlMs: deps.config.noticeTtlMs,
    });
  }

  start(): void {
    if (this.startedAt !== null) return;
    this.startedAt = this.now();
    this.cache.start();
    this.logger.info("[ratings] engine started");
  }

  stop(): void {
    if (this.startedAt === null) return;
    this.cache.stop();
    this.guard.clear();
    this.startedAt = null;
    this.logger.info("[ratings] engine stopped");
  }

  snapshot(): RatingEngineSnapshot {
    return {
      running: this.startedAt !== null,
      uptimeMs: this.startedAt === null ? 0 : this.now() - this.startedAt,
      cachedAggregates: this.cache.size,
      guardMarkers: this.guard.size,
    };
  }

  /**
   * Publica el resumen de un item linkeado en el canal.
   *
   * - Si ya hay un resumen activo en el contexto, no publica otro.
   * - Antes de postear reserva el slot (item, contexto) con un claim atómico; quien
   *   pierde el claim responde ALREADY-POSTED sin postear.
   * - Si el registro existe pero su mensaje desapareció, publica y re-asocia.
   * - `?rating=N` del link se guarda como voto del autor si aún no votó.
   */
  async publishItem(
    link: ItemLink,
    context: RatingContext,
    postedBy: UserId,
  ): Promise<PublishOutcome> {
    const existingRes = await this.service.findItem(link.itemId, context);
    if (existingRes.isErr()) return this.publishFailed(link.itemId, existingRes.error);
    const existing = existingRes.value;
    if (existing?.messageId) return { state: "ALREADY-POSTED", item: existing };

    const token = `${postedBy}:${this.now()}:${++this.claimSeq}`;
    const claimed = await this.service.claimDisplay(link.itemId, context, token, postedBy);
    if (claimed.isErr()) return this.publishFailed(link.itemId, claimed.error);
    if (!claimed.value) return this.claimLost(link.itemId, context);

    const posted = await this.postClaimed(link, context, postedBy, existing?.postedBy ?? postedBy);
    if (posted.isErr()) {
      const released = await this.service.releaseDisplay(link.itemId, context, token);
      if (released.isErr()) {
        this.logger.warn("[ratings] could not release summary claim", {
          itemId: link.itemId,
          ...context,
          error: released.error,
        });
      }
      return this.publishFailed(link.itemId, posted.error);
    }

    this.logger.info("[ratings] summary posted", {
      itemId: link.itemId,
      ...context,
      messageId: posted.value.item.messageId,
    });
    return { state: "POSTED", ...posted.value };
  }

  private async postClaimed(
    link: ItemLink,
    context: RatingContext,
    postedBy: UserId,
    author: UserId | null,
  ): Promise<Result<{ item: TrackedItem; stats: RatingStats }>> {
    if (link.rating !== null) {
      const seeded = await this.seedPosterRating(postedBy, link.itemId, context, link.rating);
      if (seeded.isErr()) return ErrResult(seeded.error);
    }

    const statsRes = await this.service.validateRating(link.itemId, context);
    if (statsRes.isErr()) return ErrResult(statsRes.error);

    let messageId: string;
    try {
      messageId = await this.display.post(context, { itemId: link.itemId, postedBy: author }, statsRes.value);
    } catch (error) {
      return ErrResult(toError(error));
    }

    const attached = await this.service.attachDisplay(link.itemId, context, messageId, author);
    return attached.map((item) => ({ item, stats: statsRes.value }));
  }

  private async claimLost(itemId: ItemId, context: RatingContext): Promise<PublishOutcome> {
    const current = await this.service.findItem(itemId, context);
    if (current.isErr()) return this.publishFailed(itemId, current.error);
    if (!current.value) {
      return this.publishFailed(itemId, new Error("Summary slot is claimed but the item is missing"));
    }
    this.logger.debug("[ratings] summary already being posted", { itemId, ...context });
    return { state: "ALREADY-POSTED", item: current.value };
  }

  private async seedPosterRating(
    userId: UserId,
    itemId: ItemId,
    context: RatingContext,
    value: number,
  ): Promise<Result<boolean>> {
    const rated = await this.service.hasRated(userId, itemId, context);
    if (rated.isErr()) return ErrResult(rated.error);
    if (rated.value) return OkResult(false);

    const written = await this.service.recordRating(userId, itemId, context, value);
    return written.map(() => true);
  }

  private publishFailed(itemId: ItemId, error: Error): PublishOutcome {
    this.logger.error("[ratings] failed to publish summary", { itemId, error });
    return { state: "FAILED", itemId, error };
  }
}

export const createRatingEngine = (deps: RatingEngineDeps): RatingEngine =>
  new RatingEngine(deps);
