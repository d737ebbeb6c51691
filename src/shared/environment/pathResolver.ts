import { mkdirSync } from "node:fs";
import os from "node:os";
import path from "node:path";

const HOME_ENV = "LOGPULL_HOME";
const DIRECTORY_NAME = ".logpull";

type HomeSubdirectory = "config" | "state" | "logs";

let resolvedHome: string | null = null;

/**
 * LOGPULL_HOME 优先；否则使用平台的用户配置目录。
 */
function platformHome(): string {
  const override = process.env[HOME_ENV]?.trim();
  if (override) {
    return path.resolve(override);
  }
  switch (process.platform) {
    case "win32":
      return path.resolve(
        process.env.APPDATA ?? process.env.LOCALAPPDATA ?? path.join(os.homedir(), "AppData", "Roaming"),
        DIRECTORY_NAME
      );
    case "darwin":
      return path.resolve(os.homedir(), "Library", "Application Support", DIRECTORY_NAME);
    default:
      return path.resolve(process.env.XDG_CONFIG_HOME ?? path.join(os.homedir(), ".config"), DIRECTORY_NAME);
  }
}

/**
 * 首次访问时确定 home 并创建子目录，之后在进程内复用。
 */
function homeSubdirectory(name: HomeSubdirectory): string {
  if (resolvedHome === null) {
    const home = platformHome();
    for (const sub of ["config", "state", "logs"] satisfies HomeSubdirectory[]) {
      mkdirSync(path.join(home, sub), { recursive: true });
    }
    resolvedHome = home;
  }
  return path.join(resolvedHome, name);
}

export function getLogpullLogsDirectory(): string {
  return homeSubdirectory("logs");
}

export function joinConfigPath(...segments: readonly string[]): string {
  return path.join(homeSubdirectory("config"), ...segments);
}

export function joinStatePath(...segments: readonly string[]): string {
  return path.join(homeSubdirectory("state"), ...segments);
}

/**
 * 游标基路径统一为规范化的绝对路径：相对路径以 state 目录为基准，
 * 绝对路径去掉 `..`、重复分隔符，使 pathFor 与目录扫描得到的路径一致。
 */
export function resolveStateBasePath(stateFile: string): string {
  return path.isAbsolute(stateFile) ? path.resolve(stateFile) : joinStatePath(stateFile);
}
