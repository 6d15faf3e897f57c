/**
 * IMDb title links.
 *
 * Purpose: recognise a posted title link (`https://www.imdb.com/title/tt0133093/`)
 * and the optional `?rating=N` the poster can attach as their own vote.
 */
import type { ItemId } from "@/db/types";
import { isAcceptedRating } from "./codec";

const TITLE_LINK = /https?:\/\/(?:www\.|m\.)?imdb\.com\/title\/(tt\d+)\/?[^\s>]*/i;

export interface ItemLink {
  itemId: ItemId;
  url: string;
  /** Poster's own rating from `?rating=N`, when it is a valid 1-10 integer. */
  rating: number | null;
}

export const imdbTitleUrl = (itemId: ItemId): string =>
  `https://www.imdb.com/title/${itemId}/`;

function readRatingParam(rawUrl: string): number | null {
  let parsed: URL;
  try {
    parsed = new URL(rawUrl);
  } catch {
    return null;
  }
  const raw = parsed.searchParams.get("rating");
  if (raw === null || !/^\d+$/.test(raw.trim())) return null;
  const value = Number(raw.trim());
  return isAcceptedRating(value) ? value : null;
}

export function parseItemLink(content: string): ItemLink | null {
  const match = TITLE_LINK.exec(content);
  const rawId = match?.[1];
  if (!match || !rawId) return null;

  const itemId = rawId.toLowerCase();
  return {
    itemId,
    url: imdbTitleUrl(itemId),
    rating: readRatingParam(match[0]),
  };
}
