import { z } from "zod";

import { findExpressionProblem } from "../../poller/emitter/parsers.js";

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)?$/;

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000
};

/**
 * 时长：数字按秒计；字符串可带单位 ms/s/m/h/d，无单位按秒。输出为毫秒。
 */
export const DurationSchema = z
  .union([z.number().positive(), z.string().trim().regex(DURATION_PATTERN, "duration must look like 60, \"30s\" or \"5m\"")])
  .transform((value, ctx) => {
    let ms: number;
    if (typeof value === "number") {
      ms = Math.round(value * 1000);
    } else {
      const match = DURATION_PATTERN.exec(value);
      const amount = Number(match?.[1]);
      const factor = UNIT_MS[match?.[2] ?? "s"] ?? 1000;
      ms = Math.round(amount * factor);
    }
    // 不足 1ms 的值取整后为 0
    if (!Number.isFinite(ms) || ms <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "duration must be at least 1ms" });
      return z.NEVER;
    }
    return ms;
  });

export const FormatSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("json") }).strict(),
  z
    .object({
      type: z.literal("none"),
      messageKey: z.string().min(1).optional()
    })
    .strict(),
  z
    .object({
      type: z.literal("regexp"),
      expression: z.string().min(1, { message: "expression must not be empty" }),
      timeKey: z.string().min(1).optional(),
      keepTimeKey: z.boolean().optional()
    })
    .strict()
]).superRefine((format, ctx) => {
  if (format.type !== "regexp" || format.expression.length === 0) {
    return;
  }
  const problem = findExpressionProblem(format.expression);
  if (problem !== null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["expression"], message: `expression ${problem}` });
  }
});

export const PollerConfigSchema = z
  .object({
    tag: z.string({ required_error: "tag is required" }).min(1, { message: "tag must not be empty" }),
    logGroupName: z
      .string({ required_error: "logGroupName is required" })
      .min(1, { message: "logGroupName must not be empty" }),
    logStreamName: z
      .string({ required_error: "logStreamName is required" })
      .min(1, { message: "logStreamName must not be empty" }),
    useLogStreamNamePrefix: z.boolean().default(false),
    stateFile: z
      .string({ required_error: "stateFile is required" })
      .min(1, { message: "stateFile must not be empty" }),
    fetchInterval: DurationSchema.default(60),
    startDaysAgo: z.number().int().nonnegative().optional(),
    region: z.string().min(1).optional(),
    awsKeyId: z.string().min(1).optional(),
    awsSecKey: z.string().min(1).optional(),
    httpProxy: z.string().url({ message: "httpProxy must be a URL" }).optional(),
    endpoint: z.string().url({ message: "endpoint must be a URL" }).optional(),
    format: FormatSchema.optional()
  })
  .strict()
  .superRefine((value, ctx) => {
    if (Boolean(value.awsKeyId) !== Boolean(value.awsSecKey)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [value.awsKeyId ? "awsSecKey" : "awsKeyId"],
        message: "awsKeyId and awsSecKey must be configured together"
      });
    }
  });

export type PollerConfigInput = z.input<typeof PollerConfigSchema>;
export type ParsedPollerConfig = z.output<typeof PollerConfigSchema>;
export type FormatConfig = z.output<typeof FormatSchema>;
