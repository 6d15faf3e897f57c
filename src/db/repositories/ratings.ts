/**
 * Repositorio de ratings (MongoDB).
 *
 * Responsabilidad:
 * - Persistir un rating por `(guildId, channelId, itemId, userId)` usando ese
 *   composite como `_id` determinístico.
 * - Validar cada documento leído con Zod y mapearlo a `RatingRecord`.
 *
 * Invariantes:
 * - La unicidad la garantiza la clave primaria vía upsert atómico, nunca un
 *   read-then-write.
 * - Dos upserts concurrentes sobre un `_id` inexistente pueden chocar con
 *   E11000 (carrera documentada del driver); se reintenta una vez y el segundo
 *   intento actualiza el documento que ganó la inserción.
 * - Nunca lanza: todo error del driver vuelve como `Err`.
 */
import type { Collection } from "mongodb";
import { isDuplicateKeyError } from "@/db/errors";
import { getDb } from "@/db/mongo";
import {
  RATING_COLLECTION,
  RatingDocumentSchema,
  type RatingDocument,
} from "@/db/schemas/rating";
import type { ItemId, UserId } from "@/db/types";
import { ratingKey } from "@/modules/ratings/context";
import { summarizeRatings, type RatingStore } from "@/modules/ratings/store";
import type { RatingContext, RatingRecord, RatingStats } from "@/modules/ratings/types";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";

const toRecord = (doc: RatingDocument): RatingRecord => ({
  userId: doc.userId,
  itemId: doc.itemId,
  context: { guildId: doc.guildId, channelId: doc.channelId },
  value: doc.value,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const parseRating = (doc: unknown): RatingDocument | null => {
  const parsed = RatingDocumentSchema.safeParse(doc);
  if (parsed.success) return parsed.data;
  console.error("[ratings-repo] invalid rating document; skipping", parsed.error.message);
  return null;
};

export class MongoRatingStore implements RatingStore {
  constructor(private readonly collectionName: string = RATING_COLLECTION) {}

  async collection(): Promise<Collection<RatingDocument>> {
    return (await getDb()).collection<RatingDocument>(this.collectionName);
  }

  async ensureIndexes(): Promise<void> {
    const col = await this.collection();
    await col.createIndex(
      { guildId: 1, channelId: 1, itemId: 1 },
      { name: "item_context" },
    );
    await col.createIndex({ userId: 1 }, { name: "user" });
  }

  async hasRated(
    userId: UserId,
    itemId: ItemId,
    context: RatingContext,
  ): Promise<Result<boolean>> {
    try {
      const col = await this.collection();
      const count = await col.countDocuments(
        { _id: ratingKey(userId, itemId, context) },
        { limit: 1 },
      );
      return OkResult(count > 0);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async get(
    userId: UserId,
    itemId: ItemId,
    context: RatingContext,
  ): Promise<Result<RatingRecord | null>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne({ _id: ratingKey(userId, itemId, context) });
      const parsed = doc ? parseRating(doc) : null;
      return OkResult(parsed ? toRecord(parsed) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  private async writeRating(
    userId: UserId,
    itemId: ItemId,
    context: RatingContext,
    value: number,
  ): Promise<RatingDocument | null> {
    const col = await this.collection();
    const now = new Date();
    return col.findOneAndUpdate(
      { _id: ratingKey(userId, itemId, context) },
      {
        $set: { value, updatedAt: now },
        $setOnInsert: {
          userId,
          itemId,
          guildId: context.guildId,
          channelId: context.channelId,
          createdAt: now,
        },
      },
      { upsert: true, returnDocument: "after" },
    );
  }

  async upsert(
    userId: UserId,
    itemId: ItemId,
    context: RatingContext,
    value: number,
  ): Promise<Result<RatingRecord>> {
    try {
      let doc: RatingDocument | null;
      try {
        doc = await this.writeRating(userId, itemId, context, value);
      } catch (error) {
        if (!isDuplicateKeyError(error)) throw error;
        doc = await this.writeRating(userId, itemId, context, value);
      }

      const parsed = doc ? parseRating(doc) : null;
      if (!parsed) {
        return ErrResult(new Error(`Upsert returned no valid rating for ${ratingKey(userId, itemId, context)}`));
      }
      return OkResult(toRecord(parsed));
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async remove(
    userId: UserId,
    itemId: ItemId,
    context: RatingContext,
    expectedValue?: number,
  ): Promise<Result<boolean>> {
    try {
      const col = await this.collection();
      const _id = ratingKey(userId, itemId, context);
      const res = await col.deleteOne(
        expectedValue === undefined ? { _id } : { _id, value: expectedValue },
      );
      return OkResult((res.deletedCount ?? 0) > 0);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async statsFor(itemId: ItemId, context: RatingContext): Promise<Result<RatingStats>> {
    try {
      const col = await this.collection();
      const docs = await col
        .find(
          { itemId, guildId: context.guildId, channelId: context.channelId },
          { projection: { value: 1 } },
        )
        .toArray();

      const values = docs
        .map((doc) => doc.value)
        .filter((value) => Number.isInteger(value) && value >= 1 && value <= 10);
      return OkResult(summarizeRatings(values));
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async countAll(): Promise<Result<number>> {
    try {
      const col = await this.collection();
      return OkResult(await col.countDocuments({}));
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}

export const ratingStore = new MongoRatingStore();
