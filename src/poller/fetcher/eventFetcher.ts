import type { GetEventsPosition, LogStoreReader, RemoteLogEvent } from "../remote/types.js";
import { createLoggerFacade, type LoggerFacade } from "../../shared/logging/logger.js";

export interface FetchRequest {
  readonly logGroupName: string;
  readonly logStreamName: string;
  readonly cursor?: string | null;
  /** 起始时间下界（epoch 毫秒），仅在没有游标时生效 */
  readonly startTime?: number;
}

export interface FetchedPage {
  readonly events: readonly RemoteLogEvent[];
  /** 远端签发的下一个位置；空页同样推进游标 */
  readonly nextCursor: string;
  readonly position: GetEventsPosition;
}

/**
 * 游标优先；没有游标时使用起始时间；都没有则交给远端默认行为。
 */
export function resolvePosition(cursor: string | null | undefined, startTime: number | undefined): GetEventsPosition {
  if (cursor) {
    return { kind: "token", nextToken: cursor };
  }
  if (startTime !== undefined) {
    return { kind: "startTime", startTime };
  }
  return { kind: "head" };
}

/**
 * 每个流每个周期只读取一页，不循环取尽，避免单个活跃流饿死其他流。
 * 远端错误原样抛给调度器，这里不重试。
 */
export class EventFetcher {
  private readonly logger: LoggerFacade;

  constructor(private readonly reader: LogStoreReader) {
    this.logger = createLoggerFacade("event-fetcher");
  }

  async fetch(request: FetchRequest): Promise<FetchedPage> {
    const position = resolvePosition(request.cursor, request.startTime);
    const response = await this.reader.getEvents(request.logGroupName, request.logStreamName, position);

    this.logger.info("Fetched log events", {
      logGroup: request.logGroupName,
      logStream: request.logStreamName,
      position: position.kind,
      count: response.events.length
    });

    return {
      events: response.events,
      nextCursor: response.nextForwardToken,
      position
    };
  }
}
