export type FieldMap = Record<string, unknown>;

/**
 * 下游事件管道边界。emit 对轮询器而言是发出即忘，下游自身的持久性不在本系统范围内。
 */
export interface EventSink {
  emit(tag: string, time: number, record: FieldMap): void;
}
