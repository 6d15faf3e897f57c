/**
 * Unit Tests: Aggregate computation shared by the rating stores
 */
import { describe, expect, it } from "vitest";
import { roundToTenth, summarizeRatings } from "@/modules/ratings/store";

describe("summarizeRatings", () => {
  it("returns zeroes for an empty group", () => {
    expect(summarizeRatings([])).toEqual({ average: 0, count: 0, ratingValues: [] });
  });

  it("averages and rounds to one decimal", () => {
    expect(summarizeRatings([7, 8, 8])).toEqual({ average: 7.7, count: 3, ratingValues: [7, 8, 8] });
    expect(summarizeRatings([10, 5])).toEqual({ average: 7.5, count: 2, ratingValues: [10, 5] });
  });

  it("copies the input values", () => {
    const values = [4];
    const stats = summarizeRatings(values);
    values.push(9);
    expect(stats.ratingValues).toEqual([4]);
  });
});

describe("roundToTenth", () => {
  it("rounds half up at the first decimal", () => {
    expect(roundToTenth(7.25)).toBe(7.3);
    expect(roundToTenth(6.666)).toBe(6.7);
    expect(roundToTenth(3)).toBe(3);
  });
});
