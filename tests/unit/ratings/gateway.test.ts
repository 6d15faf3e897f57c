/**
 * Unit Tests: Detection of summaries that no longer exist
 */
import { describe, expect, it } from "vitest";
import { isUnknownMessageError } from "@/modules/ratings/gateway";

describe("isUnknownMessageError", () => {
  it("recognises Discord's unknown message and channel codes", () => {
    expect(isUnknownMessageError({ code: 10008 })).toBe(true);
    expect(isUnknownMessageError({ code: 10003 })).toBe(true);
  });

  it("recognises the error text", () => {
    expect(isUnknownMessageError(new Error("[404] Unknown Message"))).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isUnknownMessageError(new Error("Missing Access"))).toBe(false);
    expect(isUnknownMessageError({ code: 50013 })).toBe(false);
    expect(isUnknownMessageError(null)).toBe(false);
    expect(isUnknownMessageError("Unknown Message")).toBe(false);
  });
});
