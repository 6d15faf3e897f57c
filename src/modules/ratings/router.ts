/**
 * Rating Event Router.
 *
 * Propósito: traducir reacciones de Discord a mutaciones de ratings.
 * Encaje: lo invocan los listeners de `src/events/listeners/ratings.ts`; no conoce
 * tipos de Seyfert, solo `ReactionEvent`.
 *
 * Máquina de estados (add):
 *   RECEIVED → VALIDATED → DEDUPE-CHECKED → PERSISTED → CACHE-INVALIDATED
 *   → DISPLAY-REFRESH-REQUESTED → DONE
 *   salidas: REJECTED-INVALID-EMOJI, REJECTED-DUPLICATE, FAILED-PERSISTENCE.
 * Máquina de estados (remove):
 *   RECEIVED → SELF-ACTION-CHECK → EMOJI-VALIDATED → RATING-REMOVED
 *   → CACHE-INVALIDATED → DISPLAY-REFRESH-REQUESTED → DONE
 *
 * Invariantes:
 * - Cada evento termina en un estado terminal que se devuelve y se loguea.
 * - La persistencia se confirma antes de cualquier llamada saliente (remoción,
 *   aviso, refresh). Un fallo saliente se loguea y nunca revierte el rating.
 * - El guard se marca ANTES de pedir la remoción correctiva al gateway.
 * - El router no agrega locks: el upsert/delete atómico del store decide carreras.
 */
import { decodeRatingEmoji, encodeRating, isAcceptedRating } from "./codec";
import type { SelfActionGuard } from "./guard";
import type { RatingService } from "./service";
import type {
  RatingStats,
  ReactionAddOutcome,
  ReactionEvent,
  ReactionGateway,
  ReactionRemoveOutcome,
  RatingContext,
  RatingLogger,
  SummaryDisplay,
  TrackedItem,
} from "./types";
import { invalidEmojiNotice, ratingChangedNotice } from "./views";

export const DEFAULT_NOTICE_TTL_MS = 5_000;

export interface RatingEventRouterDeps {
  service: RatingService;
  guard: SelfActionGuard;
  gateway: ReactionGateway;
  display: SummaryDisplay;
  logger: RatingLogger;
  noticeTtlMs?: number;
}

/** Key the guard uses for a reaction: custom emoji id, else its unicode name. */
export const guardSymbol = (event: Pick<ReactionEvent, "emoji" | "emojiId">): string =>
  event.emojiId ?? event.emoji ?? "";

/** Identifier the REST API expects when deleting a reaction (`name:id` for custom emojis). */
export const reactionIdentifier = (
  event: Pick<ReactionEvent, "emoji" | "emojiId">,
): string | null => {
  if (event.emojiId) return `${event.emoji ?? "_"}:${event.emojiId}`;
  return event.emoji ?? null;
};

const eventContext = (event: ReactionEvent) => ({
  guildId: event.context.guildId,
  channelId: event.context.channelId,
  messageId: event.messageId,
  userId: event.userId,
  emoji: event.emoji,
});

export class RatingEventRouter {
  private readonly service: RatingService;
  private readonly guard: SelfActionGuard;
  private readonly gateway: ReactionGateway;
  private readonly display: SummaryDisplay;
  private readonly logger: RatingLogger;
  private readonly noticeTtlMs: number;

  constructor(deps: RatingEventRouterDeps) {
    this.service = deps.service;
    this.guard = deps.guard;
    this.gateway = deps.gateway;
    this.display = deps.display;
    this.logger = deps.logger;
    this.noticeTtlMs = deps.noticeTtlMs ?? DEFAULT_NOTICE_TTL_MS;
  }

  // ----------------------------- reaction add -----------------------------

  async handleReactionAdd(event: ReactionEvent): Promise<ReactionAddOutcome> {
    if (event.isBot) return { state: "IGNORED-BOT" };

    const itemRes = await this.service.findItemByMessage(event.messageId, event.context);
    if (itemRes.isErr()) {
      this.logger.error("[ratings] tracked item lookup failed", { ...eventContext(event), error: itemRes.error });
      return { state: "FAILED-PERSISTENCE", itemId: null, error: itemRes.error };
    }
    const item = itemRes.value;
    if (!item) return { state: "IGNORED-UNTRACKED" };

    // VALIDATED
    const value = decodeRatingEmoji(event.emoji);
    if (!isAcceptedRating(value)) {
      await this.rejectInvalid(event);
      return { state: "REJECTED-INVALID-EMOJI", emoji: guardSymbol(event) };
    }

    // DEDUPE-CHECKED
    const existingRes = await this.service.getRating(event.userId, item.itemId, event.context);
    if (existingRes.isErr()) {
      this.logger.error("[ratings] existing rating lookup failed", { ...eventContext(event), itemId: item.itemId, error: existingRes.error });
      return { state: "FAILED-PERSISTENCE", itemId: item.itemId, error: existingRes.error };
    }
    const previousValue = existingRes.value?.value ?? null;
    if (previousValue === value) {
      this.logger.info("[ratings] duplicate rating ignored", { ...eventContext(event), itemId: item.itemId, value });
      return { state: "REJECTED-DUPLICATE", itemId: item.itemId, value };
    }

    // PERSISTED + CACHE-INVALIDATED
    const writeRes = await this.service.recordRating(event.userId, item.itemId, event.context, value);
    if (writeRes.isErr()) {
      this.logger.error("[ratings] failed to persist rating", { ...eventContext(event), itemId: item.itemId, value, error: writeRes.error });
      return { state: "FAILED-PERSISTENCE", itemId: item.itemId, error: writeRes.error };
    }

    if (previousValue !== null) {
      await this.retireSuperseded(event, previousValue, value);
    }

    // DISPLAY-REFRESH-REQUESTED
    const stats = await this.refreshDisplay(item);
    this.logger.debug("[ratings] rating stored", { ...eventContext(event), itemId: item.itemId, value, previousValue });
    return { state: "DONE", itemId: item.itemId, value, previousValue, stats };
  }

  private async rejectInvalid(event: ReactionEvent): Promise<void> {
    this.logger.info("[ratings] invalid rating emoji", eventContext(event));

    const identifier = reactionIdentifier(event);
    if (identifier) {
      await this.correctiveRemove(event.context, event.messageId, event.userId, guardSymbol(event), identifier);
    }
    await this.notify(event.context, invalidEmojiNotice(event.userId));
  }

  /** The rating was replaced; the reaction that carried the old value is now the duplicate. */
  private async retireSuperseded(
    event: ReactionEvent,
    previousValue: number,
    value: number,
  ): Promise<void> {
    const previousSymbol = encodeRating(previousValue);
    if (previousSymbol) {
      await this.correctiveRemove(event.context, event.messageId, event.userId, previousSymbol, previousSymbol);
    }
    await this.notify(event.context, ratingChangedNotice(event.userId, previousValue, value));
  }

  private async correctiveRemove(
    context: RatingContext,
    messageId: string,
    userId: string,
    symbol: string,
    identifier: string,
  ): Promise<void> {
    this.guard.mark(userId, messageId, symbol);
    try {
      await this.gateway.removeReaction(context, messageId, identifier, userId);
    } catch (error) {
      this.logger.warn("[ratings] corrective reaction removal failed", { ...context, messageId, userId, symbol, error });
    }
  }

  async notify(context: RatingContext, content: string): Promise<void> {
    try {
      await this.gateway.sendTransientNotice(context, content, this.noticeTtlMs);
    } catch (error) {
      this.logger.warn("[ratings] transient notice failed", { ...context, error });
    }
  }

  // ----------------------------- reaction remove -----------------------------

  async handleReactionRemove(event: ReactionEvent): Promise<ReactionRemoveOutcome> {
    if (event.isBot) return { state: "IGNORED-BOT" };

    // SELF-ACTION-CHECK
    if (this.guard.isSelfInitiated(event.userId, event.messageId, guardSymbol(event))) {
      this.logger.debug("[ratings] suppressed echo of corrective removal", eventContext(event));
      return { state: "IGNORED-SELF-ACTION" };
    }

    const itemRes = await this.service.findItemByMessage(event.messageId, event.context);
    if (itemRes.isErr()) {
      this.logger.error("[ratings] tracked item lookup failed", { ...eventContext(event), error: itemRes.error });
      return { state: "FAILED-PERSISTENCE", itemId: null, error: itemRes.error };
    }
    const item = itemRes.value;
    if (!item) return { state: "IGNORED-UNTRACKED" };

    // EMOJI-VALIDATED
    const value = decodeRatingEmoji(event.emoji);
    if (!isAcceptedRating(value)) return { state: "IGNORED-INVALID-EMOJI" };

    // RATING-REMOVED + CACHE-INVALIDATED
    const removeRes = await this.service.removeRating(event.userId, item.itemId, event.context, value);
    if (removeRes.isErr()) {
      this.logger.error("[ratings] failed to remove rating", { ...eventContext(event), itemId: item.itemId, error: removeRes.error });
      return { state: "FAILED-PERSISTENCE", itemId: item.itemId, error: removeRes.error };
    }
    if (!removeRes.value) {
      // Ya no existe o guarda otro valor: quitar una reacción vieja no borra un rating nuevo.
      this.logger.debug("[ratings] stale reaction removal ignored", { ...eventContext(event), itemId: item.itemId });
      return { state: "IGNORED-STALE", itemId: item.itemId };
    }

    // DISPLAY-REFRESH-REQUESTED
    const stats = await this.refreshDisplay(item);
    return { state: "DONE", itemId: item.itemId, removedValue: value, stats };
  }

  // ----------------------------- summary lifecycle -----------------------------

  /** The summary message was deleted: clear the reference so the item can be re-posted. */
  async handleSummaryDeleted(messageId: string, context: RatingContext): Promise<TrackedItem | null> {
    const itemRes = await this.service.findItemByMessage(messageId, context);
    if (itemRes.isErr()) {
      this.logger.error("[ratings] tracked item lookup failed", { ...context, messageId, error: itemRes.error });
      return null;
    }
    const item = itemRes.value;
    if (!item) return null;

    const cleared = await this.service.clearDisplay(item);
    if (cleared.isErr()) {
      this.logger.error("[ratings] failed to clear display reference", { ...context, messageId, itemId: item.itemId, error: cleared.error });
    }
    return item;
  }

  /**
   * Recalcula el agregado y lo proyecta en el resumen.
   * Nunca falla hacia el caller: el rating ya está persistido.
   */
  async refreshDisplay(item: TrackedItem): Promise<RatingStats | null> {
    const statsRes = await this.service.getStats(item.itemId, item.context);
    if (statsRes.isErr()) {
      this.logger.error("[ratings] failed to compute aggregate", { itemId: item.itemId, ...item.context, error: statsRes.error });
      return null;
    }
    const stats = statsRes.value;
    if (!item.messageId) return stats;

    try {
      const result = await this.display.refresh(item, stats);
      if (result === "gone") {
        this.logger.warn("[ratings] summary message is gone; clearing display reference", {
          itemId: item.itemId,
          ...item.context,
          messageId: item.messageId,
        });
        const cleared = await this.service.clearDisplay(item);
        if (cleared.isErr()) {
          this.logger.error("[ratings] failed to clear display reference", { itemId: item.itemId, error: cleared.error });
        }
      }
    } catch (error) {
      this.logger.warn("[ratings] summary refresh failed", { itemId: item.itemId, ...item.context, messageId: item.messageId, error });
    }
    return stats;
  }
}
