import { Type } from "@sinclair/typebox";
import { OptionalNullable, decodeWire } from "./schema.js";

export const SystemStatusWireSchema = Type.Object({
  feeds: Type.Object(
    {
      total: Type.Integer({ default: 0 }),
      latest_checked: OptionalNullable(Type.String()),
    },
    { default: {} },
  ),
  categories: Type.Object({ total: Type.Integer({ default: 0 }) }, { default: {} }),
  entries: Type.Object(
    {
      total: Type.Integer({ default: 0 }),
      latest: OptionalNullable(Type.String()),
    },
    { default: {} },
  ),
  update_interval: Type.Integer({ default: 0 }),
});

export interface SystemStatus {
  readonly feedCount: number;
  readonly categoryCount: number;
  readonly entryCount: number;
  readonly latestChecked: string | null;
  readonly latestEntry: string | null;
  /** Seconds between scheduled feed refreshes. */
  readonly updateInterval: number;
}

export function decodeSystemStatus(raw: unknown): SystemStatus {
  const wire = decodeWire(SystemStatusWireSchema, raw, "status");
  return {
    feedCount: wire.feeds.total,
    categoryCount: wire.categories.total,
    entryCount: wire.entries.total,
    latestChecked: wire.feeds.latest_checked ?? null,
    latestEntry: wire.entries.latest ?? null,
    updateInterval: wire.update_interval,
  };
}
