import os from "os";
import { resolveCatalogPath } from "../tools/ToolCatalog";

export interface ServerConfig {
  port: number;
  /** `COMMANDS_CATALOG` as given; tried before the files in `baseDir`. */
  catalogOverride?: string;
  baseDir: string;
  channelCapacity: number;
  killSignal: NodeJS.Signals;
  workDir?: string;
}

export const DEFAULT_CHANNEL_CAPACITY = 256;

function isSignal(name: string): name is NodeJS.Signals {
  return Object.prototype.hasOwnProperty.call(os.constants.signals, name);
}

function positiveInt(raw: string | undefined, fallback: number, key: string): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new Error(`${key} must be a positive integer, got '${raw}'`);
  return n;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env, baseDir = process.cwd()): ServerConfig {
  const killSignal = env.EXECUTION_KILL_SIGNAL || "SIGTERM";
  if (!isSignal(killSignal)) throw new Error(`EXECUTION_KILL_SIGNAL is not a signal name: '${killSignal}'`);
  return {
    port: positiveInt(env.PORT, 3000, "PORT"),
    catalogOverride: env.COMMANDS_CATALOG || undefined,
    baseDir,
    channelCapacity: positiveInt(env.EXECUTION_CHANNEL_CAPACITY, DEFAULT_CHANNEL_CAPACITY, "EXECUTION_CHANNEL_CAPACITY"),
    killSignal,
    workDir: env.EXECUTION_CWD || undefined,
  };
}

/** Looked up again on each call, so a catalog created after startup is found. */
export function locateCatalog(config: Pick<ServerConfig, "catalogOverride" | "baseDir">): string | undefined {
  return resolveCatalogPath(config.catalogOverride, config.baseDir);
}
