import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";

import { ZodError } from "zod";

import { ConfigurationError, describeError } from "../errors.js";
import type { CloudWatchTransportOptions } from "../remote/cloudwatch.js";
import { joinConfigPath, resolveStateBasePath } from "../../shared/environment/pathResolver.js";
import { createLoggerFacade } from "../../shared/logging/logger.js";
import { PollerConfigSchema, type FormatConfig, type ParsedPollerConfig } from "../../shared/schemas/config.js";

export type StreamSelectionConfig =
  | { readonly mode: "fixed"; readonly streamName: string }
  | { readonly mode: "prefix"; readonly prefix: string };

export type ParserConfig =
  | { readonly type: "json" }
  | { readonly type: "none"; readonly messageKey?: string }
  | { readonly type: "regexp"; readonly expression: string; readonly timeKey?: string; readonly keepTimeKey?: boolean };

export interface PollerConfig {
  readonly tag: string;
  readonly logGroupName: string;
  readonly selection: StreamSelectionConfig;
  /** 游标文件基路径（已解析为绝对路径） */
  readonly stateFile: string;
  readonly fetchIntervalMs: number;
  readonly startDaysAgo?: number;
  readonly transport: CloudWatchTransportOptions;
  readonly format?: ParserConfig;
  /** 配置来源文件；直接由对象构建时为 undefined */
  readonly sourcePath?: string;
}

export interface LoadOptions {
  readonly filePath?: string;
  readonly env?: NodeJS.ProcessEnv;
}

const ENV_CONFIG_PATH = "LOGPULL_CONFIG";
const CONFIG_FILE_NAME = "poller.json";

const logger = createLoggerFacade("config");

export function resolveConfigPath(customPath?: string, env: NodeJS.ProcessEnv = process.env): string {
  const explicit = customPath ?? env[ENV_CONFIG_PATH];
  if (explicit && explicit.trim().length > 0) {
    return path.resolve(explicit.trim());
  }
  const userConfig = joinConfigPath(CONFIG_FILE_NAME);
  if (existsSync(userConfig)) {
    return userConfig;
  }
  const repoConfig = path.resolve("config", CONFIG_FILE_NAME);
  if (existsSync(repoConfig)) {
    return repoConfig;
  }
  return userConfig;
}

async function readConfigFile(configPath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new ConfigurationError(`Config file not found: ${configPath}`, [], "configuration_missing", error);
    }
    throw new ConfigurationError(`Failed to read config file ${configPath}: ${describeError(error)}`, [], "configuration_missing", error);
  }
  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new ConfigurationError(`Config file ${configPath} is not valid JSON: ${describeError(error)}`, [], "configuration_invalid", error);
  }
}

export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${location}: ${issue.message}`;
  });
}

function normaliseFormat(format: FormatConfig): ParserConfig {
  switch (format.type) {
    case "json":
      return { type: "json" };
    case "none":
      return format.messageKey ? { type: "none", messageKey: format.messageKey } : { type: "none" };
    case "regexp":
      return {
        type: "regexp",
        expression: format.expression,
        ...(format.timeKey ? { timeKey: format.timeKey } : {}),
        ...(format.keepTimeKey !== undefined ? { keepTimeKey: format.keepTimeKey } : {})
      };
  }
}

function normaliseConfig(parsed: ParsedPollerConfig, sourcePath?: string): PollerConfig {
  const transport: CloudWatchTransportOptions = {
    ...(parsed.region ? { region: parsed.region } : {}),
    ...(parsed.awsKeyId ? { awsKeyId: parsed.awsKeyId } : {}),
    ...(parsed.awsSecKey ? { awsSecKey: parsed.awsSecKey } : {}),
    ...(parsed.httpProxy ? { httpProxy: parsed.httpProxy } : {}),
    ...(parsed.endpoint ? { endpoint: parsed.endpoint } : {})
  };

  return {
    tag: parsed.tag,
    logGroupName: parsed.logGroupName,
    selection: parsed.useLogStreamNamePrefix
      ? { mode: "prefix", prefix: parsed.logStreamName }
      : { mode: "fixed", streamName: parsed.logStreamName },
    stateFile: resolveStateBasePath(parsed.stateFile),
    fetchIntervalMs: parsed.fetchInterval,
    transport,
    ...(parsed.startDaysAgo !== undefined ? { startDaysAgo: parsed.startDaysAgo } : {}),
    ...(parsed.format ? { format: normaliseFormat(parsed.format) } : {}),
    ...(sourcePath ? { sourcePath } : {})
  };
}

/**
 * 校验任意输入并转换为 PollerConfig，失败时抛出列出全部问题的 ConfigurationError。
 */
export function parsePollerConfig(raw: unknown, sourcePath?: string): PollerConfig {
  try {
    return normaliseConfig(PollerConfigSchema.parse(raw), sourcePath);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = formatIssues(error);
      const where = sourcePath ? ` in ${sourcePath}` : "";
      throw new ConfigurationError(`Invalid poller configuration${where}: ${issues.join("; ")}`, issues, "configuration_invalid", error);
    }
    throw error;
  }
}

export async function loadPollerConfig(options: LoadOptions = {}): Promise<PollerConfig> {
  const configPath = resolveConfigPath(options.filePath, options.env);
  const raw = await readConfigFile(configPath);
  const config = parsePollerConfig(raw, configPath);
  logger.info("Configuration loaded", {
    configPath,
    logGroup: config.logGroupName,
    selection: config.selection.mode,
    fetchIntervalMs: config.fetchIntervalMs
  });
  return config;
}
