import type { ItemId, UserId } from "@/db/types";
import type { RatingContext } from "./types";

// Keys compuestas estables: mismas reglas que los `_id` de Mongo para que cache y DB coincidan.
export const contextKey = (context: RatingContext): string =>
  `${context.guildId}:${context.channelId}`;

export const itemKey = (itemId: ItemId, context: RatingContext): string =>
  `${contextKey(context)}:${itemId}`;

export const ratingKey = (
  userId: UserId,
  itemId: ItemId,
  context: RatingContext,
): string => `${itemKey(itemId, context)}:${userId}`;
