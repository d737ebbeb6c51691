/**
 * 远端日志存储读取接口。令牌与时间戳语义由远端定义，本系统原样透传。
 */

export interface RemoteLogEvent {
  /** 远端分配的事件时间，epoch 毫秒 */
  readonly timestamp: number;
  readonly message: string;
}

export interface LogStreamDescriptor {
  readonly name: string;
  readonly lastEventTimestamp?: number;
}

/**
 * 读取位置：续传令牌优先；没有令牌时用起始时间；都没有则由远端决定（全部历史）。
 */
export type GetEventsPosition =
  | { readonly kind: "token"; readonly nextToken: string }
  | { readonly kind: "startTime"; readonly startTime: number }
  | { readonly kind: "head" };

export interface GetEventsResult {
  readonly events: readonly RemoteLogEvent[];
  readonly nextForwardToken: string;
}

export interface DescribeStreamsRequest {
  readonly namePrefix?: string;
  readonly nextToken?: string;
}

export interface DescribeStreamsResult {
  readonly streams: readonly LogStreamDescriptor[];
  readonly nextToken?: string;
}

export interface LogStoreReader {
  getEvents(group: string, stream: string, position: GetEventsPosition): Promise<GetEventsResult>;
  describeStreams(group: string, request: DescribeStreamsRequest): Promise<DescribeStreamsResult>;
}
