/**
 * Mapeo de payloads del gateway a los tipos del motor.
 *
 * Solo se tipa la parte del payload que se usa; los listeners anotan el
 * parámetro con estas formas.
 */
import type { RatingContext, ReactionEvent } from "./types";

export type ReactionPayload = {
  userId: string;
  messageId: string;
  channelId: string;
  guildId?: string;
  emoji: { id?: string | null; name?: string | null };
  member?: { user?: { bot?: boolean } };
};

export type DeletedMessagePayload = {
  id: string;
  channelId: string;
  guildId?: string;
};

export type PostedMessagePayload = {
  id: string;
  channelId: string;
  guildId?: string;
  content: string;
  author: { id: string; bot?: boolean };
};

/** Reactions outside a guild carry no rating context and map to `null`. */
export function toReactionEvent(
  payload: ReactionPayload,
  botId: string | null,
): ReactionEvent | null {
  if (!payload.guildId) return null;
  return {
    userId: payload.userId,
    messageId: payload.messageId,
    context: { guildId: payload.guildId, channelId: payload.channelId },
    emoji: payload.emoji.name ?? null,
    emojiId: payload.emoji.id ?? null,
    isBot: payload.userId === botId || payload.member?.user?.bot === true,
  };
}

export function messageContext(
  payload: Pick<DeletedMessagePayload, "channelId" | "guildId">,
): RatingContext | null {
  if (!payload.guildId) return null;
  return { guildId: payload.guildId, channelId: payload.channelId };
}
