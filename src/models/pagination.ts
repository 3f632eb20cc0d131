import { Type } from "@sinclair/typebox";
import { decodeWire } from "./schema.js";

export const DEFAULT_PAGE = 1;
export const DEFAULT_PER_PAGE = 50;

export const PaginationWireSchema = Type.Object({
  page: Type.Integer({ default: DEFAULT_PAGE }),
  per_page: Type.Integer({ default: DEFAULT_PER_PAGE }),
  total: Type.Integer({ default: 0 }),
  pages: Type.Integer({ default: 1 }),
  has_next: Type.Boolean({ default: false }),
  has_prev: Type.Boolean({ default: false }),
});

/** Page-window metadata attached to an entry listing. */
export interface Pagination {
  readonly page: number;
  readonly perPage: number;
  readonly total: number;
  readonly pages: number;
  readonly hasNext: boolean;
  readonly hasPrev: boolean;
}

export function decodePagination(raw: unknown): Pagination {
  const wire = decodeWire(PaginationWireSchema, raw, "pagination");
  return {
    page: wire.page,
    perPage: wire.per_page,
    total: wire.total,
    pages: wire.pages,
    hasNext: wire.has_next,
    hasPrev: wire.has_prev,
  };
}
