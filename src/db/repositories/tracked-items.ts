/**
 * Repositorio de items trackeados (resumen publicado por item y contexto).
 *
 * Modelo:
 * - `_id` = `${guildId}:${channelId}:${itemId}` → como mucho un registro, y por lo
 *   tanto un mensaje de resumen activo, por (item, contexto).
 * - `messageId = null` significa "el resumen desapareció"; el registro se conserva
 *   para que el item se pueda volver a publicar.
 * - `claimToken` reserva el slot mientras un publisher postea el resumen. Un claim
 *   sin resolver en `CLAIM_TTL_MS` se considera abandonado.
 */
import type { Collection } from "mongodb";
import { isDuplicateKeyError } from "@/db/errors";
import { getDb } from "@/db/mongo";
import {
  TRACKED_ITEM_COLLECTION,
  TrackedItemDocumentSchema,
  type TrackedItemDocument,
} from "@/db/schemas/tracked-item";
import type { ItemId, MessageId, UserId } from "@/db/types";
import { itemKey } from "@/modules/ratings/context";
import type { TrackedItemStore } from "@/modules/ratings/store";
import type { RatingContext, TrackedItem } from "@/modules/ratings/types";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";

export const CLAIM_TTL_MS = 60_000;

const toDomain = (doc: TrackedItemDocument): TrackedItem => ({
  itemId: doc.itemId,
  context: { guildId: doc.guildId, channelId: doc.channelId },
  messageId: doc.messageId,
  postedBy: doc.postedBy,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const parseItem = (doc: unknown): TrackedItem | null => {
  const parsed = TrackedItemDocumentSchema.safeParse(doc);
  if (parsed.success) return toDomain(parsed.data);
  console.error("[tracked-items] invalid document; skipping", parsed.error.message);
  return null;
};

export class MongoTrackedItemStore implements TrackedItemStore {
  constructor(private readonly collectionName: string = TRACKED_ITEM_COLLECTION) {}

  async collection(): Promise<Collection<TrackedItemDocument>> {
    return (await getDb()).collection<TrackedItemDocument>(this.collectionName);
  }

  async ensureIndexes(): Promise<void> {
    const col = await this.collection();
    await col.createIndex(
      { messageId: 1, guildId: 1, channelId: 1 },
      { name: "message_context" },
    );
  }

  async find(itemId: ItemId, context: RatingContext): Promise<Result<TrackedItem | null>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne({ _id: itemKey(itemId, context) });
      return OkResult(doc ? parseItem(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async findByMessage(
    messageId: MessageId,
    context: RatingContext,
  ): Promise<Result<TrackedItem | null>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne({
        messageId,
        guildId: context.guildId,
        channelId: context.channelId,
      });
      return OkResult(doc ? parseItem(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  /**
   * Upsert condicional: sólo matchea si no hay mensaje ni claim vivo. Si el
   * documento existe pero no matchea, el upsert intenta insertar el mismo `_id`
   * y Mongo responde E11000, que acá significa "otro publisher tiene el slot".
   */
  async claim(
    itemId: ItemId,
    context: RatingContext,
    token: string,
    postedBy: UserId | null,
  ): Promise<Result<boolean>> {
    try {
      const col = await this.collection();
      const now = new Date();
      const staleBefore = new Date(now.getTime() - CLAIM_TTL_MS);
      const res = await col.updateOne(
        {
          _id: itemKey(itemId, context),
          messageId: null,
          $or: [{ claimToken: null }, { claimedAt: { $lt: staleBefore } }],
        },
        {
          $set: { claimToken: token, claimedAt: now, updatedAt: now },
          $setOnInsert: {
            itemId,
            guildId: context.guildId,
            channelId: context.channelId,
            postedBy,
            createdAt: now,
          },
        },
        { upsert: true },
      );
      return OkResult(res.upsertedCount > 0 || res.matchedCount > 0);
    } catch (error) {
      if (isDuplicateKeyError(error)) return OkResult(false);
      return ErrResult(toError(error));
    }
  }

  async release(itemId: ItemId, context: RatingContext, token: string): Promise<Result<boolean>> {
    try {
      const col = await this.collection();
      const res = await col.updateOne(
        { _id: itemKey(itemId, context), claimToken: token },
        { $set: { claimToken: null, claimedAt: null, updatedAt: new Date() } },
      );
      return OkResult(res.modifiedCount > 0);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async attachMessage(
    itemId: ItemId,
    context: RatingContext,
    messageId: MessageId,
    postedBy: UserId | null,
  ): Promise<Result<TrackedItem>> {
    try {
      const col = await this.collection();
      const now = new Date();
      const doc = await col.findOneAndUpdate(
        { _id: itemKey(itemId, context) },
        {
          $set: { messageId, claimToken: null, claimedAt: null, updatedAt: now },
          $setOnInsert: {
            itemId,
            guildId: context.guildId,
            channelId: context.channelId,
            postedBy,
            createdAt: now,
          },
        },
        { upsert: true, returnDocument: "after" },
      );
      const item = doc ? parseItem(doc) : null;
      if (!item) {
        return ErrResult(new Error(`Upsert returned no valid tracked item for ${itemKey(itemId, context)}`));
      }
      return OkResult(item);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async clearMessage(itemId: ItemId, context: RatingContext): Promise<Result<boolean>> {
    try {
      const col = await this.collection();
      const res = await col.updateOne(
        { _id: itemKey(itemId, context) },
        { $set: { messageId: null, updatedAt: new Date() } },
      );
      return OkResult(res.modifiedCount > 0);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}

export const trackedItemStore = new MongoTrackedItemStore();
