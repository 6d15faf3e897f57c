/**
 * Motivación: reunir los textos y el embed del resumen en un solo lugar.
 *
 * Idea/concepto: helpers puros; no envían nada ni consultan datos. El gateway
 * (`gateway.ts`) es quien los publica.
 */
import { Embed } from "seyfert";
import type { APIEmbed, APIEmbedField } from "seyfert/lib/types";
import type { ItemId, UserId } from "@/db/types";
import { RATING_EMOJIS, RATING_MAX } from "./codec";
import { imdbTitleUrl } from "./links";
import type { RatingStats, TrackedItem } from "./types";

export const SUMMARY_COLOR = 0xf5c518;
export const USER_RATING_FIELD = "User Rating";
export const POSTED_BY_FIELD = "Posted by";

const FIRST_EMOJI = RATING_EMOJIS[0] ?? "";
const LAST_EMOJI = RATING_EMOJIS[RATING_EMOJIS.length - 1] ?? "";

export function formatAggregate(stats: RatingStats): string {
  if (stats.count === 0) return "Not rated yet";
  const votes = stats.count === 1 ? "1 vote" : `${stats.count} votes`;
  return `⭐ ${stats.average.toFixed(1)}/${RATING_MAX} · ${votes}`;
}

export function summaryEmbedData(item: Pick<TrackedItem, "itemId" | "postedBy">, stats: RatingStats): APIEmbed {
  const fields: APIEmbedField[] = [
    { name: USER_RATING_FIELD, value: formatAggregate(stats), inline: true },
  ];
  // Discord no renderiza menciones en el footer; en un field sí.
  if (item.postedBy) {
    fields.push({ name: POSTED_BY_FIELD, value: `<@${item.postedBy}>`, inline: true });
  }
  return {
    title: `IMDb ${item.itemId}`,
    url: imdbTitleUrl(item.itemId),
    color: SUMMARY_COLOR,
    description: `React with ${FIRST_EMOJI} … ${LAST_EMOJI} to rate. One rating per member; reacting again replaces it.`,
    fields,
  };
}

export function buildSummaryEmbed(item: Pick<TrackedItem, "itemId" | "postedBy">, stats: RatingStats): Embed {
  return new Embed(summaryEmbedData(item, stats));
}

// ----------------------------- notices -----------------------------

export const invalidEmojiNotice = (userId: UserId): string =>
  `<@${userId}>, only ${FIRST_EMOJI} … ${LAST_EMOJI} reactions count as a rating here.`;

export const ratingChangedNotice = (
  userId: UserId,
  previous: number,
  next: number,
): string => `<@${userId}>, your rating changed from ${previous} to ${next}.`;

export const alreadyPostedNotice = (itemId: ItemId): string =>
  `${itemId} is already posted in this channel. React on the existing summary to rate it.`;
