import { Type } from "@sinclair/typebox";
import { OptionalNullable, decodeWire } from "./schema.js";

export const FeedCategoryWireSchema = Type.Object({
  id: Type.Integer(),
  title: Type.String(),
});

export const FeedWireSchema = Type.Object({
  id: Type.Integer(),
  title: Type.String(),
  site_url: OptionalNullable(Type.String()),
  feed_url: Type.String(),
  category: OptionalNullable(FeedCategoryWireSchema),
  checked_at: OptionalNullable(Type.String()),
  disabled: Type.Boolean({ default: false }),
  parsing_error_count: Type.Integer({ default: 0 }),
  entry_count: Type.Integer({ default: 0 }),
});

export interface FeedCategoryRef {
  readonly id: number;
  readonly title: string;
}

/** One subscribed RSS/Atom source. */
export interface Feed {
  readonly id: number;
  readonly title: string;
  readonly siteUrl: string | null;
  readonly feedUrl: string;
  readonly category: FeedCategoryRef | null;
  /** Last fetch time as sent by the server; the format is not guaranteed. */
  readonly checkedAt: string | null;
  readonly disabled: boolean;
  readonly parsingErrorCount: number;
  readonly entryCount: number;
}

export function decodeFeed(raw: unknown): Feed {
  const wire = decodeWire(FeedWireSchema, raw, "feed");
  return {
    id: wire.id,
    title: wire.title,
    siteUrl: wire.site_url ?? null,
    feedUrl: wire.feed_url,
    category: wire.category ? { id: wire.category.id, title: wire.category.title } : null,
    checkedAt: wire.checked_at ?? null,
    disabled: wire.disabled,
    parsingErrorCount: wire.parsing_error_count,
    entryCount: wire.entry_count,
  };
}
