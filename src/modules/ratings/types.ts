/**
 * Domain types for the ratings engine.
 *
 * Purpose: keep the shapes shared by the codec, stores, cache and router in one
 * place so the Mongo documents (`src/db/schemas`) never leak past the repositories.
 */
import type {
  ChannelId,
  EmojiSymbol,
  GuildId,
  ItemId,
  MessageId,
  UserId,
} from "@/db/types";

/** Scope in which an item's ratings are tracked independently. */
export interface RatingContext {
  guildId: GuildId;
  channelId: ChannelId;
}

/** Aggregate view of one (item, context) rating group. */
export interface RatingStats {
  /** Mean of all current ratings, rounded to one decimal. `0` when empty. */
  average: number;
  count: number;
  ratingValues: number[];
}

export interface RatingRecord {
  userId: UserId;
  itemId: ItemId;
  context: RatingContext;
  value: number;
  createdAt: Date;
  updatedAt: Date;
}

/** An item tracked in one context, with the summary message that displays it. */
export interface TrackedItem {
  itemId: ItemId;
  context: RatingContext;
  /** `null` once the summary message is known to be gone. */
  messageId: MessageId | null;
  postedBy: UserId | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Reaction event as the router consumes it, already stripped of gateway types. */
export interface ReactionEvent {
  userId: UserId;
  messageId: MessageId;
  context: RatingContext;
  /** Unicode name of the emoji; `null` for custom emojis without a unicode name. */
  emoji: EmojiSymbol | null;
  /** Custom emoji id, when the reaction used a guild emoji. */
  emojiId?: string | null;
  isBot?: boolean;
}

export type ReactionAddOutcome =
  | { state: "IGNORED-BOT" }
  | { state: "IGNORED-UNTRACKED" }
  | { state: "REJECTED-INVALID-EMOJI"; emoji: string }
  | { state: "REJECTED-DUPLICATE"; itemId: ItemId; value: number }
  | { state: "FAILED-PERSISTENCE"; itemId: ItemId | null; error: Error }
  | {
      state: "DONE";
      itemId: ItemId;
      value: number;
      previousValue: number | null;
      stats: RatingStats | null;
    };

export type ReactionRemoveOutcome =
  | { state: "IGNORED-BOT" }
  | { state: "IGNORED-SELF-ACTION" }
  | { state: "IGNORED-UNTRACKED" }
  | { state: "IGNORED-INVALID-EMOJI" }
  | { state: "IGNORED-STALE"; itemId: ItemId }
  | { state: "FAILED-PERSISTENCE"; itemId: ItemId | null; error: Error }
  | { state: "DONE"; itemId: ItemId; removedValue: number; stats: RatingStats | null };

/** Result of asking the display layer to project fresh stats onto a summary. */
export type DisplayRefreshResult = "updated" | "gone";

/** Narrow logging surface; seyfert's `Logger` satisfies it. */
export interface RatingLogger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/** Corrective actions the router performs through the chat gateway. */
export interface ReactionGateway {
  /** Removes `emoji` from `messageId` on behalf of `userId`. */
  removeReaction(
    context: RatingContext,
    messageId: MessageId,
    emoji: string,
    userId: UserId,
  ): Promise<void>;

  /** Sends a short-lived notice to the channel; it deletes itself after `ttlMs`. */
  sendTransientNotice(context: RatingContext, content: string, ttlMs: number): Promise<void>;
}

/** Projection of the aggregate onto the posted summary message. */
export interface SummaryDisplay {
  /** Posts a new summary for `item` and returns its message id. */
  post(
    context: RatingContext,
    item: Pick<TrackedItem, "itemId" | "postedBy">,
    stats: RatingStats,
  ): Promise<MessageId>;

  refresh(item: TrackedItem, stats: RatingStats): Promise<DisplayRefreshResult>;
}

export type PublishOutcome =
  | { state: "POSTED"; item: TrackedItem; stats: RatingStats }
  | { state: "ALREADY-POSTED"; item: TrackedItem }
  | { state: "FAILED"; itemId: ItemId; error: Error };
