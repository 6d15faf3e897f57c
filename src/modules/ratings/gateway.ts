/**
 * Motivación: aislar las llamadas REST de Discord que necesita el motor de ratings.
 *
 * Idea/concepto: implementa `ReactionGateway` y `SummaryDisplay` sobre el cliente
 * de Seyfert. El router solo conoce esas interfaces; los tests usan fakes.
 *
 * Alcance: sin reglas de negocio. Los errores se propagan salvo dos casos:
 * - el borrado diferido del aviso transitorio (se loguea),
 * - un mensaje de resumen inexistente en `refresh`, que se reporta como "gone".
 */
import type { UsingClient } from "seyfert";
import type { MessageId, UserId } from "@/db/types";
import { RATING_EMOJIS } from "./codec";
import type {
  DisplayRefreshResult,
  RatingContext,
  RatingLogger,
  RatingStats,
  ReactionGateway,
  SummaryDisplay,
  TrackedItem,
} from "./types";
import { buildSummaryEmbed } from "./views";

/** Discord JSON error codes for a message or channel that no longer exists. */
const UNKNOWN_CHANNEL = 10003;
const UNKNOWN_MESSAGE = 10008;

export function isUnknownMessageError(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;
  if ("code" in error && (error.code === UNKNOWN_MESSAGE || error.code === UNKNOWN_CHANNEL)) {
    return true;
  }
  const message = "message" in error && typeof error.message === "string" ? error.message : "";
  return /Unknown (Message|Channel)|\b1000[38]\b/.test(message);
}

export class SeyfertRatingGateway implements ReactionGateway, SummaryDisplay {
  constructor(
    private readonly client: UsingClient,
    private readonly logger: RatingLogger,
  ) {}

  async removeReaction(
    context: RatingContext,
    messageId: MessageId,
    emoji: string,
    userId: UserId,
  ): Promise<void> {
    await this.client.reactions.delete(messageId, context.channelId, emoji, userId);
  }

  async sendTransientNotice(context: RatingContext, content: string, ttlMs: number): Promise<void> {
    const notice = await this.client.messages.write(context.channelId, { content });

    const timer = setTimeout(() => {
      this.client.messages.delete(notice.id, context.channelId).catch((error: unknown) => {
        this.logger.warn("[ratings] could not delete transient notice", {
          ...context,
          messageId: notice.id,
          error,
        });
      });
    }, ttlMs);
    timer.unref?.();
  }

  async post(
    context: RatingContext,
    item: Pick<TrackedItem, "itemId" | "postedBy">,
    stats: RatingStats,
  ): Promise<MessageId> {
    const message = await this.client.messages.write(context.channelId, {
      embeds: [buildSummaryEmbed(item, stats)],
    });

    // Orden 1..10 para que el picker muestre la escala completa.
    for (const emoji of RATING_EMOJIS) {
      try {
        await this.client.reactions.add(message.id, context.channelId, emoji);
      } catch (error) {
        this.logger.warn("[ratings] could not seed rating reaction", {
          ...context,
          messageId: message.id,
          emoji,
          error,
        });
        break;
      }
    }

    return message.id;
  }

  async refresh(item: TrackedItem, stats: RatingStats): Promise<DisplayRefreshResult> {
    if (!item.messageId) return "gone";
    try {
      await this.client.messages.edit(item.messageId, item.context.channelId, {
        embeds: [buildSummaryEmbed(item, stats)],
      });
      return "updated";
    } catch (error) {
      if (isUnknownMessageError(error)) return "gone";
      throw error;
    }
  }
}
