import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ResponseDecodeError } from "../errors.js";

export type JsonRecord = Record<string, unknown>;

export function isJsonRecord(value: unknown): value is JsonRecord {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export const Nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()]);

/** Key may be absent or `null`; both decode to `null` in the record. */
export const OptionalNullable = <T extends TSchema>(schema: T) =>
  Type.Optional(Nullable(schema));

/**
 * Validates an untyped response value against a wire schema.
 *
 * The input is cloned, missing keys take the schema defaults, and the result is checked.
 * Extra keys are left in place and ignored by the record mappers.
 */
export function decodeWire<T extends TSchema>(schema: T, raw: unknown, label: string): Static<T> {
  const value = Value.Default(schema, Value.Clone(raw));
  if (Value.Check(schema, value)) {
    return value;
  }
  const first = Value.Errors(schema, value).First();
  const path = first?.path || "/";
  throw new ResponseDecodeError(
    `Invalid ${label} in response at ${path}: ${first?.message ?? "unexpected shape"}`,
    { path },
  );
}

export function decodeList<T>(raw: unknown, label: string, decode: (item: unknown) => T): T[] {
  if (!Array.isArray(raw)) {
    throw new ResponseDecodeError(`Expected a list of ${label} in response`, { path: "/" });
  }
  return raw.map((item) => decode(item));
}
