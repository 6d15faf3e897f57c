/**
 * Emoji rating codec.
 *
 * Maps the eleven keycap symbols to integer ratings and back. Pure and total
 * over its domain: anything else decodes to `null`.
 *
 * `0️⃣` is reserved: it decodes to `0` but `isAcceptedRating(0)` is false, so
 * the router treats it as an invalid vote.
 */

const KEYCAP = "\u20E3";
const VARIATION_SELECTOR = "\uFE0F";
const KEYCAP_TEN = "\u{1F51F}";

export const RATING_MIN = 1;
export const RATING_MAX = 10;

const keycap = (digit: number): string => `${digit}${VARIATION_SELECTOR}${KEYCAP}`;

/** Symbol for every value in `[0, 10]`, indexed by value. */
const SYMBOLS: readonly string[] = [
  ...Array.from({ length: 10 }, (_, digit) => keycap(digit)),
  KEYCAP_TEN,
];

const DECODE_TABLE: ReadonlyMap<string, number> = new Map(
  SYMBOLS.flatMap((symbol, value): Array<[string, number]> => {
    if (value === 10) return [[symbol, value]];
    // Some clients send the keycap without the variation selector.
    return [
      [symbol, value],
      [`${value}${KEYCAP}`, value],
    ];
  }),
);

/** Accepted rating symbols in ascending order (1️⃣ … 🔟). */
export const RATING_EMOJIS: readonly string[] = SYMBOLS.slice(RATING_MIN);

export function decodeRatingEmoji(symbol: string | null | undefined): number | null {
  if (!symbol) return null;
  return DECODE_TABLE.get(symbol) ?? null;
}

export function encodeRating(value: number): string | null {
  if (!Number.isInteger(value)) return null;
  return SYMBOLS[value] ?? null;
}

export function isAcceptedRating(value: number | null): value is number {
  return (
    value !== null &&
    Number.isInteger(value) &&
    value >= RATING_MIN &&
    value <= RATING_MAX
  );
}
