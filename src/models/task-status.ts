import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { decodeWire } from "./schema.js";

export const TaskStatusWireSchema = Type.Record(Type.String(), Type.Unknown());

export const TaskWireSchema = Type.Object({
  running: Type.Boolean({ default: false }),
});

export type TaskKey = { kind: "all-feeds" } | { kind: "feed"; feedId: number };

export type TaskEntry = TaskKey & { running: boolean };

/** Background refresh jobs tracked by the server. */
export interface TaskStatus {
  readonly feedTasks: ReadonlyMap<number, boolean>;
  readonly allFeedsRunning: boolean;
}

const FEED_TASK_KEY_RE = /^feed_(\d+)$/;

export function parseTaskKey(key: string): TaskKey | null {
  if (key === "all_feeds") {
    return { kind: "all-feeds" };
  }
  const match = FEED_TASK_KEY_RE.exec(key);
  if (!match) {
    return null;
  }
  const feedId = Number.parseInt(match[1] ?? "", 10);
  if (!Number.isSafeInteger(feedId)) {
    return null;
  }
  return { kind: "feed", feedId };
}

function readRunning(task: unknown): boolean {
  const value = Value.Default(TaskWireSchema, Value.Clone(task));
  return Value.Check(TaskWireSchema, value) ? value.running : false;
}

function parseTaskEntries(raw: unknown): TaskEntry[] {
  const wire = decodeWire(TaskStatusWireSchema, raw, "task status");
  const entries: TaskEntry[] = [];
  for (const [key, task] of Object.entries(wire)) {
    const parsed = parseTaskKey(key);
    if (!parsed) {
      continue;
    }
    entries.push({ ...parsed, running: readRunning(task) });
  }
  return entries;
}

export function decodeTaskStatus(raw: unknown): TaskStatus {
  const feedTasks = new Map<number, boolean>();
  let allFeedsRunning = false;
  for (const entry of parseTaskEntries(raw)) {
    switch (entry.kind) {
      case "all-feeds":
        allFeedsRunning = entry.running;
        break;
      case "feed":
        feedTasks.set(entry.feedId, entry.running);
        break;
    }
  }
  return { feedTasks, allFeedsRunning };
}
