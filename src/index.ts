export * from "./poller/index.js";
export * from "./poller/emitter/index.js";
export { CloudWatchLogStore, buildClientConfig, createCloudWatchLogsApi } from "./poller/remote/cloudwatch.js";
export type { CloudWatchLogsApi, CloudWatchTransportOptions } from "./poller/remote/cloudwatch.js";
export type * from "./poller/remote/types.js";
export { CursorFileStore } from "./shared/persistence/CursorFileStore.js";
export type { CursorStore, CursorFileStoreOptions } from "./shared/persistence/CursorFileStore.js";
export { setLogEventPublisher } from "./shared/logging/logger.js";
export type { LogEventLevel, LogEventPublisher, LogsAppendedPayload } from "./shared/logging/events.js";
