import { describe, expect, it, vi, type Mock } from "vitest";
import { createRssReaderClient } from "./client.js";
import {
  ApiError,
  AuthenticationError,
  ResponseDecodeError,
  RssReaderError,
} from "./errors.js";
import type { FetchFn } from "./request.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** Client whose every request answers with `body`. */
function createTestClient(body: unknown, status = 200) {
  const fetchFn = vi.fn<FetchFn>(async () => jsonResponse(body, status));
  const client = createRssReaderClient({
    baseUrl: "http://rss.test/",
    apiKey: "test-key",
    fetchFn,
  });
  return { client, fetchFn };
}

function requestedUrl(fetchFn: Mock<FetchFn>): string {
  return fetchFn.mock.calls[0][0];
}

const entryJson = {
  id: 101,
  feed_id: 7,
  title: "Hello world",
  url: "https://example.com/posts/hello",
  published_at: "2024-01-01T00:00:00Z",
  created_at: "2024-01-01T00:05:00Z",
  author: null,
  feed: { id: 7, title: "Example Blog" },
};

const feedJson = {
  id: 7,
  title: "Example Blog",
  site_url: "https://example.com",
  feed_url: "https://example.com/feed.xml",
  category: { id: 2, title: "Blogs" },
  entry_count: 1,
};

describe("createRssReaderClient", () => {
  it("lists categories", async () => {
    const { client, fetchFn } = createTestClient([
      { id: 1, title: "News", feed_count: 4 },
      { id: 2, title: "Blogs" },
    ]);

    const categories = await client.getCategories();

    expect(requestedUrl(fetchFn)).toBe("http://rss.test/api/categories");
    expect(categories).toEqual([
      { id: 1, title: "News", feedCount: 4 },
      { id: 2, title: "Blogs", feedCount: 0 },
    ]);
  });

  it("lists feeds without a category filter", async () => {
    const { client, fetchFn } = createTestClient([feedJson]);

    const feeds = await client.getFeeds();

    expect(requestedUrl(fetchFn)).toBe("http://rss.test/api/feeds");
    expect(feeds.map((f) => f.feedUrl)).toEqual(["https://example.com/feed.xml"]);
  });

  it("passes the category filter when set", async () => {
    const { client, fetchFn } = createTestClient([]);

    await client.getFeeds({ categoryId: 4 });

    expect(requestedUrl(fetchFn)).toBe("http://rss.test/api/feeds?category_id=4");
  });

  it("lists entries with default pagination", async () => {
    const { client, fetchFn } = createTestClient({
      entries: [entryJson],
      pagination: { page: 1, per_page: 50, total: 1, pages: 1 },
    });

    const result = await client.getEntries();

    expect(requestedUrl(fetchFn)).toBe("http://rss.test/api/entries?page=1&per_page=50");
    expect(result.entries.map((e) => e.id)).toEqual([101]);
    expect(result.pagination).toEqual({
      page: 1,
      perPage: 50,
      total: 1,
      pages: 1,
      hasNext: false,
      hasPrev: false,
    });
  });

  it("omits unset and zero filters from the entries query", async () => {
    const { client, fetchFn } = createTestClient({ entries: [] });

    await client.getEntries({ page: 2, categoryId: 3, feedId: 0 });

    expect(requestedUrl(fetchFn)).toBe(
      "http://rss.test/api/entries?page=2&per_page=50&category_id=3",
    );
  });

  it("defaults entries and pagination when the response omits them", async () => {
    const { client } = createTestClient({});

    const result = await client.getEntries({ feedId: 7 });

    expect(result.entries).toEqual([]);
    expect(result.pagination.perPage).toBe(50);
  });

  it("lists a category's entries with the category record", async () => {
    const { client, fetchFn } = createTestClient({
      category: { id: 5, title: "Science", feed_count: 2 },
      entries: [entryJson],
      pagination: { total: 1 },
    });

    const result = await client.getCategoryEntries(5, { perPage: 10 });

    expect(requestedUrl(fetchFn)).toBe(
      "http://rss.test/api/categories/5/entries?page=1&per_page=10",
    );
    expect(result.category).toEqual({ id: 5, title: "Science", feedCount: 2 });
    expect(result.entries).toHaveLength(1);
    expect(result.pagination.total).toBe(1);
  });

  it("returns a null feed when a feed listing omits it", async () => {
    const { client, fetchFn } = createTestClient({ entries: [entryJson] });

    const result = await client.getFeedEntries(7, { page: 3 });

    expect(requestedUrl(fetchFn)).toBe("http://rss.test/api/feeds/7/entries?page=3&per_page=50");
    expect(result.feed).toBeNull();
    expect(result.entries[0]?.feed).toEqual({ id: 7, title: "Example Blog" });
  });

  it("decodes the feed of a feed listing", async () => {
    const { client } = createTestClient({ feed: feedJson, entries: [] });

    const result = await client.getFeedEntries(7);

    expect(result.feed?.category).toEqual({ id: 2, title: "Blogs" });
  });

  it("fetches a single entry with its content", async () => {
    const { client, fetchFn } = createTestClient({
      ...entryJson,
      content: "<p>Body</p>",
      media: [],
    });

    const entry = await client.getEntry(101);

    expect(requestedUrl(fetchFn)).toBe("http://rss.test/api/entries/101");
    expect(entry.content).toBe("<p>Body</p>");
    expect(entry.media).toEqual([]);
  });

  it("reads the system status", async () => {
    const { client, fetchFn } = createTestClient({
      feeds: { total: 2 },
      categories: { total: 1 },
      entries: { total: 30, latest: "2024-05-01T07:59:00Z" },
      update_interval: 600,
    });

    const status = await client.getStatus();

    expect(requestedUrl(fetchFn)).toBe("http://rss.test/api/status");
    expect(status).toEqual({
      feedCount: 2,
      categoryCount: 1,
      entryCount: 30,
      latestChecked: null,
      latestEntry: "2024-05-01T07:59:00Z",
      updateInterval: 600,
    });
  });

  it("reads the task status", async () => {
    const { client, fetchFn } = createTestClient({
      all_feeds: { running: false },
      feed_9: { running: true },
    });

    const tasks = await client.getTaskStatus();

    expect(requestedUrl(fetchFn)).toBe("http://rss.test/api/task_status");
    expect(tasks.allFeedsRunning).toBe(false);
    expect(tasks.feedTasks.get(9)).toBe(true);
  });

  it("rejects a category listing that is not a list", async () => {
    const { client } = createTestClient({ categories: [] });

    await expect(client.getCategories()).rejects.toBeInstanceOf(ResponseDecodeError);
  });

  it("surfaces authentication failures", async () => {
    const { client } = createTestClient({ error: "bad key" }, 401);

    await expect(client.getStatus()).rejects.toThrow(new AuthenticationError("bad key"));
  });

  it("refuses a zero timeout before any request goes out", () => {
    const fetchFn = vi.fn<FetchFn>();

    expect(() =>
      createRssReaderClient({
        baseUrl: "http://rss.test/",
        apiKey: "test-key",
        timeoutMs: 0,
        fetchFn,
      }),
    ).toThrow(RssReaderError);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("surfaces API errors with their status code", async () => {
    const { client } = createTestClient({ error: "Feed not found" }, 404);

    const err = await client.getFeedEntries(999).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ApiError);
    expect((err as ApiError).statusCode).toBe(404);
    expect((err as ApiError).message).toBe("Feed not found");
  });
});
