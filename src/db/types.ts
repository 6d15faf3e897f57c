// Typed aliases for the identifiers that flow through the ratings engine.
export type GuildId = string;
export type ChannelId = string;
export type MessageId = string;
export type UserId = string;
/** External item identifier, e.g. an IMDb title id (`tt0133093`). */
export type ItemId = string;
/** Raw emoji symbol as reported by the gateway (unicode name). */
export type EmojiSymbol = string;
