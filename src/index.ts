export const VERSION = "0.1.0";

export {
  createRssReaderClient,
  type CategoryEntryPage,
  type EntryFilterOptions,
  type EntryPage,
  type FeedEntryPage,
  type PageOptions,
  type RssReaderClient,
  type RssReaderClientOptions,
} from "./client.js";
export {
  loadClientConfig,
  type ClientConfig,
  type ClientConfigInput,
  type LoadClientConfigParams,
} from "./config.js";
export {
  ApiError,
  AuthenticationError,
  ConnectionError,
  ResponseDecodeError,
  RssReaderError,
} from "./errors.js";
export {
  addLogTransport,
  createSubsystemLogger,
  getLogLevel,
  setLogLevel,
  type LogLevel,
  type LogTransport,
} from "./logging/subsystem.js";
export { decodeCategory, type Category } from "./models/category.js";
export {
  decodeEntry,
  entryPublishedAt,
  type Entry,
  type EntryFeed,
  type MediaDescriptor,
} from "./models/entry.js";
export { decodeFeed, type Feed, type FeedCategoryRef } from "./models/feed.js";
export { decodePagination, type Pagination } from "./models/pagination.js";
export { decodeSystemStatus, type SystemStatus } from "./models/system-status.js";
export { decodeTaskStatus, type TaskStatus } from "./models/task-status.js";
export {
  createRequestExecutor,
  DEFAULT_TIMEOUT_MS,
  MAX_TIMEOUT_MS,
  type ExecuteOptions,
  type FetchFn,
  type HttpMethod,
  type RequestExecutor,
  type RequestExecutorOptions,
} from "./request.js";
