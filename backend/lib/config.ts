// backend/lib/config.ts
import type { Env } from "./types.js";

export interface ServiceConfig {
  env: Env;
  storagePath: string | undefined;
  port: number;
  renderConcurrency: number;
  ffmpegPath: string;
  ffprobePath: string;
  publicBaseUrl: string;
  logLevel: LogLevelName;
  serviceName: string;
  metricsNamespace: string;
}

export const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR", "CRITICAL", "SILENT"] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const n = Number.parseInt(raw ?? "", 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export function parseLogLevel(raw: string | undefined): LogLevelName {
  const upper = String(raw ?? "INFO").toUpperCase();
  return LOG_LEVELS.find(level => level === upper) ?? "INFO";
}

export function currentEnv(source: NodeJS.ProcessEnv = process.env): Env {
  // "test" is accepted alongside the deployment stages for unit tests
  const e = String(source.RENDER_ENV || "dev");
  return e === "dev" || e === "stage" || e === "prod" || e === "test"
    ? e
    : "dev";
}

/**
 * Reads service settings from the environment. Called on demand rather
 * than once at import so tests can change variables between cases.
 */
export function loadServiceConfig(
  source: NodeJS.ProcessEnv = process.env
): ServiceConfig {
  return {
    env: currentEnv(source),
    storagePath: source.MEDIA_STORAGE_PATH || undefined,
    port: parsePositiveInt(source.PORT, 3000),
    renderConcurrency: parsePositiveInt(source.RENDER_CONCURRENCY, 1),
    ffmpegPath: source.FFMPEG_PATH || "ffmpeg",
    ffprobePath: source.FFPROBE_PATH || "ffprobe",
    publicBaseUrl: (source.PUBLIC_BASE_URL || "").replace(/\/+$/, ""),
    logLevel: parseLogLevel(source.LOG_LEVEL),
    serviceName: source.POWERTOOLS_SERVICE_NAME || "ReelComposer/Render",
    metricsNamespace: source.POWERTOOLS_METRICS_NAMESPACE || "ReelComposer",
  };
}
