/**
 * Zod schema for persisted ratings.
 * Purpose: one document per (guild, channel, item, user); `_id` is that composite key,
 * so the primary key enforces the one-rating-per-user invariant.
 */
import { z } from "zod";

export const RATING_COLLECTION = "ratings";

export const RatingDocumentSchema = z.object({
  _id: z.string(),
  userId: z.string(),
  itemId: z.string(),
  guildId: z.string(),
  channelId: z.string(),
  value: z.number().int().min(1).max(10),
  createdAt: z.date(),
  updatedAt: z.date(),
});

export type RatingDocument = z.infer<typeof RatingDocumentSchema>;
