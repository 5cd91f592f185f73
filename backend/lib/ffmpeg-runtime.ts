// backend/lib/ffmpeg-runtime.ts
import { spawn } from "node:child_process";
import { loadServiceConfig } from "./config.js";
import type { LoggingWrapper } from "./logging.js";
import type { MetricsWrapper } from "./metrics.js";
import type {
  ProbeResult,
  ProbedStream,
} from "../services/video-composition/types.js";

export type FFmpegOperation =
  | "Probe"
  | "SegmentRender"
  | "Compose"
  | "Encode"
  | "RuntimeCheck";

export interface CommandResult {
  stdout: string;
  stderr: string;
  duration: number;
}

/**
 * What the pipeline needs from the media toolchain. The ffmpeg runtime is
 * the production implementation; tests substitute an in-process fake.
 */
export interface MediaRunner {
  run(args: string[], operation: FFmpegOperation): Promise<CommandResult>;
  probe(filePath: string): Promise<ProbeResult>;
}

export class CommandFailedError extends Error {
  readonly isRetryable: boolean;

  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly stderr: string,
    timedOut = false
  ) {
    super(message);
    this.name = "CommandFailedError";
    this.isRetryable = timedOut;
  }
}

const STDERR_LIMIT = 64 * 1024;

const TIMEOUTS: Record<FFmpegOperation | "default", number> = {
  Probe: 30 * 1000,
  SegmentRender: 4 * 60 * 1000,
  Compose: 10 * 60 * 1000,
  Encode: 10 * 60 * 1000,
  RuntimeCheck: 10 * 1000,
  default: 5 * 60 * 1000,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | undefined {
  const n = typeof value === "string" ? Number.parseFloat(value) : value;
  return typeof n === "number" && Number.isFinite(n) ? n : undefined;
}

/** Parses ffprobe's "30000/1001" style rates. */
export function parseFrameRate(value: unknown): number | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const [num, den] = value.split("/").map(Number);
  if (!Number.isFinite(num) || num <= 0) {
    return undefined;
  }
  if (den === undefined) {
    return num;
  }
  return Number.isFinite(den) && den > 0 ? num / den : undefined;
}

/**
 * Turns `ffprobe -print_format json -show_format -show_streams` output
 * into a ProbeResult. Throws when the output is not the expected shape.
 */
export function parseProbeOutput(json: string): ProbeResult {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new Error(
      `ffprobe returned invalid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (!isRecord(data)) {
    throw new Error("ffprobe output is not an object");
  }

  const rawStreams = Array.isArray(data.streams) ? data.streams : [];
  const streams: ProbedStream[] = rawStreams.filter(isRecord).map(s => {
    const type = s.codec_type;
    return {
      codecType: type === "video" || type === "audio" ? type : "other",
      codecName: typeof s.codec_name === "string" ? s.codec_name : undefined,
      width: toNumber(s.width),
      height: toNumber(s.height),
      fps: parseFrameRate(s.avg_frame_rate) ?? parseFrameRate(s.r_frame_rate),
      duration: toNumber(s.duration),
    };
  });

  const format = isRecord(data.format) ? data.format : {};
  const streamDurations = streams
    .map(s => s.duration)
    .filter((d): d is number => d !== undefined);
  const duration =
    toNumber(format.duration) ??
    (streamDurations.length > 0 ? Math.max(...streamDurations) : 0);

  return {
    formatName:
      typeof format.format_name === "string" ? format.format_name : undefined,
    duration,
    streams,
  };
}

/**
 * FFmpeg runtime helper with timing, stderr capture, and metrics
 */
class FFmpegRuntime implements MediaRunner {
  private readonly ffmpegPath: string;
  private readonly ffprobePath: string;

  constructor(
    private readonly logger: LoggingWrapper,
    private readonly metrics: MetricsWrapper,
    paths: { ffmpegPath?: string; ffprobePath?: string } = {}
  ) {
    const config = loadServiceConfig();
    this.ffmpegPath = paths.ffmpegPath ?? config.ffmpegPath;
    this.ffprobePath = paths.ffprobePath ?? config.ffprobePath;
  }

  /**
   * Validate that FFmpeg runtime is available and functional
   */
  async validateRuntime(): Promise<boolean> {
    try {
      this.logger.info("Validating FFmpeg runtime availability");
      await this.executeCommand(this.ffmpegPath, ["-version"], "RuntimeCheck");
      await this.executeCommand(this.ffprobePath, ["-version"], "RuntimeCheck");
      this.logger.info("FFmpeg runtime validation successful", {
        ffmpegAvailable: true,
        ffprobeAvailable: true,
      });
      return true;
    } catch (error) {
      this.logger.error("FFmpeg runtime validation failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  run(args: string[], operation: FFmpegOperation): Promise<CommandResult> {
    return this.executeCommand(
      this.ffmpegPath,
      ["-hide_banner", "-nostdin", "-y", ...args],
      operation
    );
  }

  async probe(filePath: string): Promise<ProbeResult> {
    const { stdout } = await this.executeCommand(
      this.ffprobePath,
      [
        "-v",
        "error",
        "-print_format",
        "json",
        "-show_format",
        "-show_streams",
        filePath,
      ],
      "Probe"
    );
    return parseProbeOutput(stdout);
  }

  /**
   * Spawn a binary with an argument list; no shell is involved.
   */
  executeCommand(
    binary: string,
    args: string[],
    operation: FFmpegOperation
  ): Promise<CommandResult> {
    const startTime = Date.now();
    const timeout = TIMEOUTS[operation] ?? TIMEOUTS.default;

    this.logger.debug("Executing FFmpeg command", {
      binary,
      args: args.join(" "),
      operation,
    });

    return new Promise((resolve, reject) => {
      let settled = false;
      let stdout = "";
      let stderr = "";

      const child = spawn(binary, args, { stdio: ["ignore", "pipe", "pipe"] });

      const finish = (error: Error | null) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        const duration = Date.now() - startTime;
        const success = error === null;

        this.metrics.recordFFmpegExecution(binary, duration, success);
        this.metrics.recordOperation(operation, success, duration);

        if (error) {
          this.logger.error("FFmpeg command failed", {
            binary,
            operation,
            duration,
            error: error.message,
            stderr: stderr.slice(-2000),
          });
          reject(error);
        } else {
          this.logger.info("FFmpeg command completed successfully", {
            binary,
            operation,
            duration,
          });
          resolve({ stdout, stderr, duration });
        }
      };

      const timer = setTimeout(() => {
        child.kill("SIGKILL");
        finish(
          new CommandFailedError(
            `${binary} timed out after ${timeout}ms`,
            null,
            stderr,
            true
          )
        );
      }, timeout);

      child.stdout.on("data", (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on("data", (data: Buffer) => {
        stderr = (stderr + data.toString()).slice(-STDERR_LIMIT);
      });

      child.on("error", error => {
        finish(
          new CommandFailedError(
            `${binary} could not be started: ${error.message}`,
            null,
            stderr
          )
        );
      });

      child.on("close", code => {
        if (code === 0) {
          finish(null);
        } else {
          finish(
            new CommandFailedError(
              `${binary} exited with code ${code}: ${stderr.trim().split("\n").slice(-3).join(" | ")}`,
              code,
              stderr
            )
          );
        }
      });
    });
  }
}

export { FFmpegRuntime };
