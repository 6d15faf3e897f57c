/**
 * Unit Tests: Emoji rating codec
 *
 * Purpose: keycap symbols map to 1..10 and back; everything else is rejected.
 */
import { describe, expect, it } from "vitest";
import {
  RATING_EMOJIS,
  decodeRatingEmoji,
  encodeRating,
  isAcceptedRating,
} from "@/modules/ratings/codec";

describe("decodeRatingEmoji", () => {
  it("decodes every accepted symbol to its value", () => {
    expect(RATING_EMOJIS).toHaveLength(10);
    RATING_EMOJIS.forEach((symbol, index) => {
      expect(decodeRatingEmoji(symbol)).toBe(index + 1);
    });
  });

  it("decodes the keycap ten symbol", () => {
    expect(decodeRatingEmoji("\u{1F51F}")).toBe(10);
  });

  it("accepts keycaps sent without the variation selector", () => {
    expect(decodeRatingEmoji("7\u20E3")).toBe(7);
    expect(decodeRatingEmoji("1\u20E3")).toBe(1);
  });

  it("decodes zero but does not accept it as a rating", () => {
    const value = decodeRatingEmoji("0\uFE0F\u20E3");
    expect(value).toBe(0);
    expect(isAcceptedRating(value)).toBe(false);
  });

  it("returns null for anything else", () => {
    expect(decodeRatingEmoji("\u{1F44D}")).toBeNull();
    expect(decodeRatingEmoji("7")).toBeNull();
    expect(decodeRatingEmoji("")).toBeNull();
    expect(decodeRatingEmoji(null)).toBeNull();
    expect(decodeRatingEmoji(undefined)).toBeNull();
  });
});

describe("encodeRating", () => {
  it("is the inverse of decode for 1..10", () => {
    for (let value = 1; value <= 10; value += 1) {
      const symbol = encodeRating(value);
      expect(symbol).toBe(RATING_EMOJIS[value - 1]);
      expect(decodeRatingEmoji(symbol)).toBe(value);
    }
  });

  it("uses the variation selector form", () => {
    expect(encodeRating(3)).toBe("3\uFE0F\u20E3");
  });

  it("rejects values outside the symbol table", () => {
    expect(encodeRating(11)).toBeNull();
    expect(encodeRating(-1)).toBeNull();
    expect(encodeRating(2.5)).toBeNull();
  });
});

describe("isAcceptedRating", () => {
  it("accepts integers in [1, 10] only", () => {
    expect(isAcceptedRating(1)).toBe(true);
    expect(isAcceptedRating(10)).toBe(true);
    expect(isAcceptedRating(0)).toBe(false);
    expect(isAcceptedRating(11)).toBe(false);
    expect(isAcceptedRating(7.5)).toBe(false);
    expect(isAcceptedRating(null)).toBe(false);
  });
});
