import {
  CloudWatchLogsClient,
  DescribeLogStreamsCommand,
  GetLogEventsCommand,
  type CloudWatchLogsClientConfig,
  type DescribeLogStreamsCommandInput,
  type DescribeLogStreamsCommandOutput,
  type GetLogEventsCommandInput,
  type GetLogEventsCommandOutput
} from "@aws-sdk/client-cloudwatch-logs";
import { NodeHttpHandler } from "@smithy/node-http-handler";
import { HttpsProxyAgent } from "https-proxy-agent";

import { TransientRemoteError } from "../errors.js";
import type {
  DescribeStreamsRequest,
  DescribeStreamsResult,
  GetEventsPosition,
  GetEventsResult,
  LogStoreReader,
  LogStreamDescriptor,
  RemoteLogEvent
} from "./types.js";
import { createLoggerFacade } from "../../shared/logging/logger.js";

export interface CloudWatchTransportOptions {
  readonly region?: string;
  readonly awsKeyId?: string;
  readonly awsSecKey?: string;
  readonly httpProxy?: string;
  readonly endpoint?: string;
}

/**
 * 适配器实际用到的两个 API。生产环境由 SDK client 实现，测试中用 vi.fn 替身。
 */
export interface CloudWatchLogsApi {
  getLogEvents(input: GetLogEventsCommandInput): Promise<GetLogEventsCommandOutput>;
  describeLogStreams(input: DescribeLogStreamsCommandInput): Promise<DescribeLogStreamsCommandOutput>;
}

export function buildClientConfig(options: CloudWatchTransportOptions): CloudWatchLogsClientConfig {
  const config: CloudWatchLogsClientConfig = {};
  if (options.region) {
    config.region = options.region;
  }
  if (options.awsKeyId && options.awsSecKey) {
    config.credentials = {
      accessKeyId: options.awsKeyId,
      secretAccessKey: options.awsSecKey
    };
  }
  if (options.endpoint) {
    config.endpoint = options.endpoint;
  }
  if (options.httpProxy) {
    config.requestHandler = new NodeHttpHandler({
      httpsAgent: new HttpsProxyAgent(options.httpProxy)
    });
  }
  return config;
}

export function createCloudWatchLogsApi(options: CloudWatchTransportOptions): CloudWatchLogsApi {
  const client = new CloudWatchLogsClient(buildClientConfig(options));
  return {
    getLogEvents: (input) => client.send(new GetLogEventsCommand(input)),
    describeLogStreams: (input) => client.send(new DescribeLogStreamsCommand(input))
  };
}

/**
 * CloudWatch Logs 读取适配器
 *
 * SDK 抛出的任何错误都包装为 TransientRemoteError，原始错误保留在 cause 中；
 * 不做内部重试。
 */
export class CloudWatchLogStore implements LogStoreReader {
  private readonly logger = createLoggerFacade("cloudwatch");

  constructor(private readonly api: CloudWatchLogsApi) {}

  async getEvents(group: string, stream: string, position: GetEventsPosition): Promise<GetEventsResult> {
    const input: GetLogEventsCommandInput = {
      logGroupName: group,
      logStreamName: stream,
      startFromHead: true
    };
    if (position.kind === "token") {
      input.nextToken = position.nextToken;
    } else if (position.kind === "startTime") {
      input.startTime = position.startTime;
    }

    let response: GetLogEventsCommandOutput;
    try {
      response = await this.api.getLogEvents(input);
    } catch (error) {
      throw wrapRemoteError("getEvents", `GetLogEvents failed for ${group}/${stream}`, error);
    }

    if (!response.nextForwardToken) {
      throw new TransientRemoteError(
        `GetLogEvents returned no nextForwardToken for ${group}/${stream}`,
        "getEvents"
      );
    }

    const events: RemoteLogEvent[] = [];
    for (const event of response.events ?? []) {
      if (typeof event.timestamp !== "number" || typeof event.message !== "string") {
        this.logger.warn("Skipping incomplete log event", { logGroup: group, logStream: stream });
        continue;
      }
      events.push({ timestamp: event.timestamp, message: event.message });
    }

    return { events, nextForwardToken: response.nextForwardToken };
  }

  async describeStreams(group: string, request: DescribeStreamsRequest): Promise<DescribeStreamsResult> {
    const input: DescribeLogStreamsCommandInput = { logGroupName: group };
    if (request.namePrefix) {
      input.logStreamNamePrefix = request.namePrefix;
    }
    if (request.nextToken) {
      input.nextToken = request.nextToken;
    }

    let response: DescribeLogStreamsCommandOutput;
    try {
      response = await this.api.describeLogStreams(input);
    } catch (error) {
      throw wrapRemoteError("describeStreams", `DescribeLogStreams failed for ${group}`, error);
    }

    const streams: LogStreamDescriptor[] = [];
    for (const item of response.logStreams ?? []) {
      if (!item.logStreamName) {
        continue;
      }
      streams.push(
        typeof item.lastEventTimestamp === "number"
          ? { name: item.logStreamName, lastEventTimestamp: item.lastEventTimestamp }
          : { name: item.logStreamName }
      );
    }

    return response.nextToken ? { streams, nextToken: response.nextToken } : { streams };
  }
}

function wrapRemoteError(
  operation: "getEvents" | "describeStreams",
  message: string,
  error: unknown
): TransientRemoteError {
  const details: { errorName?: string; statusCode?: number } = {};
  if (error instanceof Error) {
    details.errorName = error.name;
    const statusCode = readStatusCode(error);
    if (statusCode !== undefined) {
      details.statusCode = statusCode;
    }
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new TransientRemoteError(`${message}: ${reason}`, operation, details, error);
}

// SDK 的 ServiceException 在 $metadata.httpStatusCode 上携带状态码
function readStatusCode(error: Error): number | undefined {
  if (!("$metadata" in error)) {
    return undefined;
  }
  const metadata = error.$metadata;
  if (typeof metadata !== "object" || metadata === null || !("httpStatusCode" in metadata)) {
    return undefined;
  }
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
}
