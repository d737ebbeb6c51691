import type { LogStoreReader, LogStreamDescriptor } from "../remote/types.js";
import { createLoggerFacade, type LoggerFacade } from "../../shared/logging/logger.js";

/**
 * 流选择方式：固定流名，或按名称前缀在远端发现。
 */
export type StreamSelection =
  | { readonly mode: "fixed"; readonly streamName: string }
  | { readonly mode: "prefix"; readonly prefix: string };

export interface StreamCatalogOptions {
  readonly reader: LogStoreReader;
  readonly logGroupName: string;
  readonly selection: StreamSelection;
  /**
   * 起始时间下界（epoch 毫秒）。配置后，最后事件时间缺失或早于该值的流被排除。
   */
  readonly horizon?: number;
}

/**
 * 按下界过滤已发现的流。未配置下界时原样返回。
 */
export function filterByRecency(
  streams: readonly LogStreamDescriptor[],
  horizon: number | undefined
): LogStreamDescriptor[] {
  if (horizon === undefined) {
    return [...streams];
  }
  return streams.filter(
    (stream) => stream.lastEventTimestamp !== undefined && stream.lastEventTimestamp >= horizon
  );
}

export class StreamCatalog {
  private readonly reader: LogStoreReader;
  private readonly logGroupName: string;
  private readonly selection: StreamSelection;
  private readonly horizon: number | undefined;
  private readonly logger: LoggerFacade;

  constructor(options: StreamCatalogOptions) {
    this.reader = options.reader;
    this.logGroupName = options.logGroupName;
    this.selection = options.selection;
    this.horizon = options.horizon;
    this.logger = createLoggerFacade("stream-catalog", { logGroup: options.logGroupName });
  }

  /**
   * 逐页发现流描述符。序列有限、惰性、不可重启：远端不再返回续传令牌即结束。
   */
  async *discover(): AsyncGenerator<LogStreamDescriptor, void, undefined> {
    if (this.selection.mode === "fixed") {
      yield { name: this.selection.streamName };
      return;
    }

    let nextToken: string | undefined;
    let page = 0;
    do {
      const response = await this.reader.describeStreams(this.logGroupName, {
        namePrefix: this.selection.prefix,
        ...(nextToken ? { nextToken } : {})
      });
      page += 1;
      for (const stream of filterByRecency(response.streams, this.horizon)) {
        yield stream;
      }
      nextToken = response.nextToken;
    } while (nextToken);

    this.logger.info("Stream discovery finished", { prefix: this.selection.prefix, pages: page });
  }

  /**
   * 汇总本周期要轮询的全部流名，保持远端返回顺序。
   */
  async resolve(): Promise<string[]> {
    const names: string[] = [];
    for await (const stream of this.discover()) {
      names.push(stream.name);
    }
    return names;
  }
}
