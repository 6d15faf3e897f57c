/**
 * Zod schema for tracked items (one posted summary per item and context).
 */
import { z } from "zod";

export const TRACKED_ITEM_COLLECTION = "tracked_items";

export const TrackedItemDocumentSchema = z.object({
  _id: z.string(),
  itemId: z.string(),
  guildId: z.string(),
  channelId: z.string(),
  messageId: z.string().nullable().default(null),
  postedBy: z.string().nullable().default(null),
  claimToken: z.string().nullable().default(null),
  claimedAt: z.date().nullable().default(null),
  createdAt: z.date(),
  updatedAt: z.date(),
});

export type TrackedItemDocument = z.infer<typeof TrackedItemDocumentSchema>;
