/**
 * Unit Tests: Environment configuration
 */
import { describe, expect, it } from "vitest";
import { loadRatingsConfig } from "@/configuration/env";
import { expectOk } from "../../_utils/fakes";

describe("loadRatingsConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(expectOk(loadRatingsConfig({}))).toEqual({
      botToken: null,
      mongoUri: null,
      dbName: "reel_ratings",
      cacheTtlMs: 300_000,
      cacheSweepMs: 60_000,
      guardCooldownMs: 5_000,
      noticeTtlMs: 5_000,
      logLevel: "info",
    });
  });

  it("converts seconds to milliseconds and trims values", () => {
    const config = expectOk(
      loadRatingsConfig({
        BOT_TOKEN: " test-token ",
        MONGO_URI: "mongodb://localhost:27017",
        DB_NAME: "ratings_test",
        RATING_CACHE_TTL_SECONDS: "1.5",
        RATING_GUARD_COOLDOWN_SECONDS: "2",
        LOG_LEVEL: "debug",
      }),
    );

    expect(config.botToken).toBe("test-token");
    expect(config.mongoUri).toBe("mongodb://localhost:27017");
    expect(config.dbName).toBe("ratings_test");
    expect(config.cacheTtlMs).toBe(1_500);
    expect(config.guardCooldownMs).toBe(2_000);
    expect(config.logLevel).toBe("debug");
  });

  it("treats blank variables as unset", () => {
    const config = expectOk(loadRatingsConfig({ BOT_TOKEN: "", DB_NAME: "   " }));
    expect(config.botToken).toBeNull();
    expect(config.dbName).toBe("reel_ratings");
  });

  it("reports every invalid variable", () => {
    const res = loadRatingsConfig({ LOG_LEVEL: "loud", RATING_CACHE_SWEEP_SECONDS: "0" });

    expect(res.isErr()).toBe(true);
    if (!res.isErr()) return;
    expect(res.error.message).toMatch(/^Invalid environment configuration \(/);
    expect(res.error.message).toContain("RATING_CACHE_SWEEP_SECONDS:");
    expect(res.error.message).toContain("LOG_LEVEL:");
  });
});
