/**
 * Unit Tests: IMDb title link parsing
 */
import { describe, expect, it } from "vitest";
import { imdbTitleUrl, parseItemLink } from "@/modules/ratings/links";

describe("parseItemLink", () => {
  it("extracts the title id from a message", () => {
    expect(parseItemLink("have you seen https://www.imdb.com/title/tt0133093/ yet?")).toEqual({
      itemId: "tt0133093",
      url: "https://www.imdb.com/title/tt0133093/",
      rating: null,
    });
  });

  it("normalises mobile links and upper-case ids", () => {
    expect(parseItemLink("https://m.imdb.com/title/TT0133093")?.itemId).toBe("tt0133093");
  });

  it("reads a valid rating parameter", () => {
    expect(parseItemLink("https://www.imdb.com/title/tt0133093/?rating=9")?.rating).toBe(9);
    expect(parseItemLink("https://www.imdb.com/title/tt0133093/?ref_=nv&rating=10")?.rating).toBe(10);
  });

  it("ignores rating parameters outside 1..10 or not integers", () => {
    expect(parseItemLink("https://www.imdb.com/title/tt0133093/?rating=0")?.rating).toBeNull();
    expect(parseItemLink("https://www.imdb.com/title/tt0133093/?rating=11")?.rating).toBeNull();
    expect(parseItemLink("https://www.imdb.com/title/tt0133093/?rating=7.5")?.rating).toBeNull();
    expect(parseItemLink("https://www.imdb.com/title/tt0133093/?rating=great")?.rating).toBeNull();
  });

  it("reads the rating from a link wrapped in angle brackets", () => {
    expect(parseItemLink("no preview: <https://www.imdb.com/title/tt0133093/?rating=7>")).toEqual({
      itemId: "tt0133093",
      url: "https://www.imdb.com/title/tt0133093/",
      rating: 7,
    });
  });

  it("returns null without a title link", () => {
    expect(parseItemLink("no links here")).toBeNull();
    expect(parseItemLink("https://www.imdb.com/name/nm0000206/")).toBeNull();
    expect(parseItemLink("https://example.com/title/tt0133093/")).toBeNull();
  });
});

describe("imdbTitleUrl", () => {
  it("builds the canonical title url", () => {
    expect(imdbTitleUrl("tt0111161")).toBe("https://www.imdb.com/title/tt0111161/");
  });
});
