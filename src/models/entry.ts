import { Type } from "@sinclair/typebox";
import { ResponseDecodeError } from "../errors.js";
import { Nullable, OptionalNullable, decodeWire } from "./schema.js";

export const EntryFeedWireSchema = Type.Object({
  id: Type.Optional(Type.Integer()),
  title: Type.Optional(Type.String()),
  site_url: OptionalNullable(Type.String()),
  feed_url: Type.Optional(Type.String()),
});

export const MediaWireSchema = Type.Record(Type.String(), Type.Unknown());

export const EntryWireSchema = Type.Object({
  id: Type.Integer(),
  feed_id: Type.Integer(),
  title: Type.String(),
  url: Type.String(),
  published_at: OptionalNullable(Type.String()),
  created_at: Type.String(),
  author: OptionalNullable(Type.String()),
  feed: Type.Optional(Nullable(EntryFeedWireSchema)),
  content: OptionalNullable(Type.String()),
  media: OptionalNullable(Type.Array(MediaWireSchema)),
});

/** The slice of feed data the server embeds in each entry. Every field may be missing. */
export interface EntryFeed {
  readonly id?: number;
  readonly title?: string;
  readonly siteUrl?: string | null;
  readonly feedUrl?: string;
}

export type MediaDescriptor = Readonly<Record<string, unknown>>;

/** One article from an aggregated feed. */
export interface Entry {
  readonly id: number;
  readonly feedId: number;
  readonly title: string;
  readonly url: string;
  readonly publishedAt: string | null;
  readonly createdAt: string;
  readonly author: string | null;
  readonly feed: EntryFeed;
  /** Only populated when the entry is fetched on its own. */
  readonly content: string | null;
  /** Only populated when the entry is fetched on its own. */
  readonly media: readonly MediaDescriptor[] | null;
}

function decodeEntryFeed(wire: {
  id?: number;
  title?: string;
  site_url?: string | null;
  feed_url?: string;
}): EntryFeed {
  const feed: { -readonly [K in keyof EntryFeed]: EntryFeed[K] } = {};
  if (wire.id !== undefined) {
    feed.id = wire.id;
  }
  if (wire.title !== undefined) {
    feed.title = wire.title;
  }
  if (wire.site_url !== undefined) {
    feed.siteUrl = wire.site_url;
  }
  if (wire.feed_url !== undefined) {
    feed.feedUrl = wire.feed_url;
  }
  return feed;
}

export function decodeEntry(raw: unknown): Entry {
  const wire = decodeWire(EntryWireSchema, raw, "entry");
  return {
    id: wire.id,
    feedId: wire.feed_id,
    title: wire.title,
    url: wire.url,
    publishedAt: wire.published_at ?? null,
    createdAt: wire.created_at,
    author: wire.author ?? null,
    feed: wire.feed ? decodeEntryFeed(wire.feed) : {},
    content: wire.content ?? null,
    media: wire.media ?? null,
  };
}

const ISO_8601 =
  /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})?)?$/;

/**
 * Parses the ISO-8601 `publishedAt` into a `Date`. A trailing `Z` is read as `+00:00`.
 * Returns null when the entry carries no published timestamp.
 */
export function entryPublishedAt(entry: Pick<Entry, "publishedAt">): Date | null {
  if (!entry.publishedAt) {
    return null;
  }
  const raw = entry.publishedAt.trim();
  const ms = ISO_8601.test(raw) ? Date.parse(raw.replace(/Z$/, "+00:00")) : Number.NaN;
  if (Number.isNaN(ms)) {
    throw new ResponseDecodeError(`Invalid published_at timestamp: ${entry.publishedAt}`, {
      path: "/published_at",
    });
  }
  return new Date(ms);
}
