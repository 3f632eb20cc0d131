import { Type } from "@sinclair/typebox";
import { decodeWire } from "./schema.js";

export const CategoryWireSchema = Type.Object({
  id: Type.Integer(),
  title: Type.String(),
  feed_count: Type.Integer({ default: 0 }),
});

/** A user-defined grouping of feeds. */
export interface Category {
  readonly id: number;
  readonly title: string;
  readonly feedCount: number;
}

export function decodeCategory(raw: unknown): Category {
  const wire = decodeWire(CategoryWireSchema, raw, "category");
  return {
    id: wire.id,
    title: wire.title,
    feedCount: wire.feed_count,
  };
}
