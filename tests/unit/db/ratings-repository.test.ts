/**
 * Unit Tests: Mongo rating repository
 *
 * Purpose: the driver calls the repository issues (filters, updates, options) and
 * how it maps driver answers and errors back into `Result`.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MongoRatingStore } from "@/db/repositories/ratings";
import { CONTEXT, expectErr, expectOk } from "../../_utils/fakes";
import { duplicateKeyError, fakeCollection } from "../../_utils/mongo";

vi.mock("@/db/mongo", async () => (await import("../../_utils/mongo")).mockMongoModule());

const KEY = "guild-1:channel-1:tt1:user-1";
const stamp = new Date("2026-01-01T00:00:00.000Z");

const ratingDoc = (value: unknown) => ({
  _id: KEY,
  userId: "user-1",
  itemId: "tt1",
  guildId: "guild-1",
  channelId: "channel-1",
  value,
  createdAt: stamp,
  updatedAt: stamp,
});

describe("MongoRatingStore", () => {
  const store = new MongoRatingStore();

  beforeEach(() => {
    fakeCollection.reset();
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("upsert", () => {
    it("writes by composite key with an atomic upsert", async () => {
      fakeCollection.script("findOneAndUpdate", ratingDoc(7));

      const record = expectOk(await store.upsert("user-1", "tt1", CONTEXT, 7));

      expect(record).toEqual({
        userId: "user-1",
        itemId: "tt1",
        context: CONTEXT,
        value: 7,
        createdAt: stamp,
        updatedAt: stamp,
      });
      expect(fakeCollection.names).toEqual(["ratings"]);
      expect(fakeCollection.callsTo("findOneAndUpdate")).toEqual([
        [
          { _id: KEY },
          {
            $set: { value: 7, updatedAt: expect.any(Date) },
            $setOnInsert: {
              userId: "user-1",
              itemId: "tt1",
              guildId: "guild-1",
              channelId: "channel-1",
              createdAt: expect.any(Date),
            },
          },
          { upsert: true, returnDocument: "after" },
        ],
      ]);
    });

    it("retries once after a duplicate key error", async () => {
      fakeCollection.script("findOneAndUpdate", duplicateKeyError(), ratingDoc(9));

      const record = expectOk(await store.upsert("user-1", "tt1", CONTEXT, 9));

      expect(record.value).toBe(9);
      expect(fakeCollection.callsTo("findOneAndUpdate")).toHaveLength(2);
    });

    it("gives up after a second duplicate key error", async () => {
      fakeCollection.script("findOneAndUpdate", duplicateKeyError(), duplicateKeyError());

      const error = expectErr(await store.upsert("user-1", "tt1", CONTEXT, 9));

      expect(error.message).toBe("E11000 duplicate key error");
      expect(fakeCollection.callsTo("findOneAndUpdate")).toHaveLength(2);
    });

    it("does not retry other driver errors", async () => {
      fakeCollection.script("findOneAndUpdate", new Error("connection reset"));

      const error = expectErr(await store.upsert("user-1", "tt1", CONTEXT, 9));

      expect(error.message).toBe("connection reset");
      expect(fakeCollection.callsTo("findOneAndUpdate")).toHaveLength(1);
    });

    it("rejects a returned document that fails validation", async () => {
      fakeCollection.script("findOneAndUpdate", ratingDoc(42));

      const error = expectErr(await store.upsert("user-1", "tt1", CONTEXT, 9));

      expect(error.message).toBe(`Upsert returned no valid rating for ${KEY}`);
      expect(console.error).toHaveBeenCalledWith(
        "[ratings-repo] invalid rating document; skipping",
        expect.any(String),
      );
    });
  });

  describe("remove", () => {
    it("deletes by key only without an expected value", async () => {
      fakeCollection.script("deleteOne", { deletedCount: 1 });

      expect(expectOk(await store.remove("user-1", "tt1", CONTEXT))).toBe(true);
      expect(fakeCollection.callsTo("deleteOne")).toEqual([[{ _id: KEY }]]);
    });

    it("matches the expected value when one is given", async () => {
      fakeCollection.script("deleteOne", { deletedCount: 1 });

      expect(expectOk(await store.remove("user-1", "tt1", CONTEXT, 7))).toBe(true);
      expect(fakeCollection.callsTo("deleteOne")).toEqual([[{ _id: KEY, value: 7 }]]);
    });

    it("answers Ok(false) when nothing was deleted", async () => {
      fakeCollection.script("deleteOne", { deletedCount: 0 });

      expect(expectOk(await store.remove("user-1", "tt1", CONTEXT, 3))).toBe(false);
    });
  });

  describe("reads", () => {
    it("aggregates the values of one item in one channel", async () => {
      fakeCollection.script("find", [{ value: 6 }, { value: 10 }, { value: 42 }]);

      const stats = expectOk(await store.statsFor("tt1", CONTEXT));

      expect(stats).toEqual({ average: 8, count: 2, ratingValues: [6, 10] });
      expect(fakeCollection.callsTo("find")).toEqual([
        [{ itemId: "tt1", guildId: "guild-1", channelId: "channel-1" }, { projection: { value: 1 } }],
      ]);
    });

    it("skips an invalid stored document", async () => {
      fakeCollection.script("findOne", ratingDoc("seven"));

      expect(expectOk(await store.get("user-1", "tt1", CONTEXT))).toBeNull();
      expect(fakeCollection.callsTo("findOne")).toEqual([[{ _id: KEY }]]);
      expect(console.error).toHaveBeenCalledTimes(1);
    });

    it("checks for an existing rating with a limited count", async () => {
      fakeCollection.script("countDocuments", 1);

      expect(expectOk(await store.hasRated("user-1", "tt1", CONTEXT))).toBe(true);
      expect(fakeCollection.callsTo("countDocuments")).toEqual([[{ _id: KEY }, { limit: 1 }]]);
    });

    it("returns driver failures as Err", async () => {
      fakeCollection.script("find", new Error("not primary"));

      expect(expectErr(await store.statsFor("tt1", CONTEXT)).message).toBe("not primary");
    });
  });
});
