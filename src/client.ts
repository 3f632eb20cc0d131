import { createSubsystemLogger, setLogLevel, type LogLevel } from "./logging/subsystem.js";
import { decodeCategory, type Category } from "./models/category.js";
import { decodeEntry, type Entry } from "./models/entry.js";
import { decodeFeed, type Feed } from "./models/feed.js";
import {
  DEFAULT_PAGE,
  DEFAULT_PER_PAGE,
  decodePagination,
  type Pagination,
} from "./models/pagination.js";
import { decodeList, isJsonRecord, type JsonRecord } from "./models/schema.js";
import { decodeSystemStatus, type SystemStatus } from "./models/system-status.js";
import { decodeTaskStatus, type TaskStatus } from "./models/task-status.js";
import { ResponseDecodeError } from "./errors.js";
import {
  createRequestExecutor,
  type FetchFn,
  type QueryValue,
  type RequestExecutor,
} from "./request.js";

const log = createSubsystemLogger("client");

export type RssReaderClientOptions = {
  /** Server root, e.g. "http://localhost:5000". Trailing slashes are stripped. */
  baseUrl: string;
  apiKey: string;
  /** Per-request timeout. Defaults to 30s. */
  timeoutMs?: number;
  logLevel?: LogLevel;
  fetchFn?: FetchFn;
};

export type PageOptions = {
  page?: number;
  perPage?: number;
};

export type EntryFilterOptions = PageOptions & {
  categoryId?: number;
  feedId?: number;
};

export type EntryPage = {
  entries: Entry[];
  pagination: Pagination;
};

export type CategoryEntryPage = EntryPage & {
  category: Category | null;
};

export type FeedEntryPage = EntryPage & {
  feed: Feed | null;
};

export interface RssReaderClient {
  readonly apiUrl: string;
  getCategories: () => Promise<Category[]>;
  getFeeds: (opts?: { categoryId?: number }) => Promise<Feed[]>;
  getEntries: (opts?: EntryFilterOptions) => Promise<EntryPage>;
  getCategoryEntries: (categoryId: number, opts?: PageOptions) => Promise<CategoryEntryPage>;
  getFeedEntries: (feedId: number, opts?: PageOptions) => Promise<FeedEntryPage>;
  getEntry: (entryId: number) => Promise<Entry>;
  getStatus: () => Promise<SystemStatus>;
  getTaskStatus: () => Promise<TaskStatus>;
}

function pageQuery(opts: PageOptions | undefined): Record<string, QueryValue> {
  return {
    page: opts?.page ?? DEFAULT_PAGE,
    per_page: opts?.perPage ?? DEFAULT_PER_PAGE,
  };
}

// 0 and undefined both mean "no filter"; the server never assigns id 0.
function filterValue(id: number | undefined): number | undefined {
  return id ? id : undefined;
}

function expectRecord(data: unknown, label: string): JsonRecord {
  if (!isJsonRecord(data)) {
    throw new ResponseDecodeError(`Expected ${label} response to be an object`, { path: "/" });
  }
  return data;
}

function decodeEntryPage(data: JsonRecord): EntryPage {
  return {
    entries: decodeList(data.entries ?? [], "entries", decodeEntry),
    pagination: decodePagination(data.pagination ?? {}),
  };
}

export function createRssReaderClient(options: RssReaderClientOptions): RssReaderClient {
  if (options.logLevel) {
    setLogLevel(options.logLevel);
  }
  const executor: RequestExecutor = createRequestExecutor({
    baseUrl: options.baseUrl,
    apiKey: options.apiKey,
    timeoutMs: options.timeoutMs,
    fetchFn: options.fetchFn,
  });
  log.debug(`client ready for ${executor.apiUrl}`);

  return {
    apiUrl: executor.apiUrl,

    async getCategories() {
      const data = await executor.execute("categories");
      return decodeList(data, "categories", decodeCategory);
    },

    async getFeeds(opts) {
      const data = await executor.execute("feeds", {
        query: { category_id: filterValue(opts?.categoryId) },
      });
      return decodeList(data, "feeds", decodeFeed);
    },

    async getEntries(opts) {
      const data = await executor.execute("entries", {
        query: {
          ...pageQuery(opts),
          category_id: filterValue(opts?.categoryId),
          feed_id: filterValue(opts?.feedId),
        },
      });
      return decodeEntryPage(expectRecord(data, "entries"));
    },

    async getCategoryEntries(categoryId, opts) {
      const data = expectRecord(
        await executor.execute(`categories/${categoryId}/entries`, { query: pageQuery(opts) }),
        "category entries",
      );
      return {
        category: isJsonRecord(data.category) ? decodeCategory(data.category) : null,
        ...decodeEntryPage(data),
      };
    },

    async getFeedEntries(feedId, opts) {
      const data = expectRecord(
        await executor.execute(`feeds/${feedId}/entries`, { query: pageQuery(opts) }),
        "feed entries",
      );
      return {
        feed: isJsonRecord(data.feed) ? decodeFeed(data.feed) : null,
        ...decodeEntryPage(data),
      };
    },

    async getEntry(entryId) {
      return decodeEntry(await executor.execute(`entries/${entryId}`));
    },

    async getStatus() {
      return decodeSystemStatus(await executor.execute("status"));
    },

    async getTaskStatus() {
      return decodeTaskStatus(await executor.execute("task_status"));
    },
  };
}
