import { describe, expect, it } from "vitest";
import { decodePagination } from "./pagination.js";

describe("decodePagination", () => {
  it("uses the documented defaults for an empty object", () => {
    expect(decodePagination({})).toEqual({
      page: 1,
      perPage: 50,
      total: 0,
      pages: 1,
      hasNext: false,
      hasPrev: false,
    });
  });

  it("maps server values", () => {
    expect(
      decodePagination({
        page: 2,
        per_page: 20,
        total: 45,
        pages: 3,
        has_next: true,
        has_prev: true,
      }),
    ).toEqual({ page: 2, perPage: 20, total: 45, pages: 3, hasNext: true, hasPrev: true });
  });
});
