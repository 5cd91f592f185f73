import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ProbeResult } from "../services/video-composition/types.js";
import {
  CommandFailedError,
  type CommandResult,
  type FFmpegOperation,
  type MediaRunner,
} from "./ffmpeg-runtime.js";

export interface RecordedCall {
  args: string[];
  operation: FFmpegOperation;
}

/**
 * In-process stand-in for ffmpeg. Each run writes a placeholder at the
 * output path (the last argument); probes answer from `probeFor`. A run
 * fails when its operation is `failOn` or `failWhen` accepts the call.
 */
export class FakeMediaRunner implements MediaRunner {
  readonly calls: RecordedCall[] = [];
  readonly probed: string[] = [];
  failOn?: FFmpegOperation;
  failWhen?: (call: RecordedCall) => boolean;

  constructor(
    private readonly probeFor: (filePath: string) => ProbeResult | undefined = () => undefined
  ) {}

  async run(args: string[], operation: FFmpegOperation): Promise<CommandResult> {
    const call = { args, operation };
    this.calls.push(call);
    const output = args[args.length - 1];
    if (output) {
      fs.mkdirSync(path.dirname(output), { recursive: true });
      fs.writeFileSync(output, `placeholder ${operation}`);
    }
    if (this.failOn === operation || this.failWhen?.(call)) {
      throw new CommandFailedError(
        `ffmpeg exited with code 1: ${operation} broke`,
        1,
        `${operation} broke`
      );
    }
    return { stdout: "", stderr: "", duration: 1 };
  }

  async probe(filePath: string): Promise<ProbeResult> {
    this.probed.push(filePath);
    const result = this.probeFor(filePath);
    if (!result) {
      throw new Error(`Invalid data found when processing input ${filePath}`);
    }
    return result;
  }

  operations(): FFmpegOperation[] {
    return this.calls.map(call => call.operation);
  }
}

export function videoProbe(
  width: number,
  height: number,
  duration: number,
  options: { audio?: boolean; codec?: string; fps?: number } = {}
): ProbeResult {
  const streams: ProbeResult["streams"] = [
    {
      codecType: "video",
      codecName: options.codec ?? "h264",
      width,
      height,
      fps: options.fps ?? 30,
      duration,
    },
  ];
  if (options.audio !== false) {
    streams.push({ codecType: "audio", codecName: "aac", duration });
  }
  return { formatName: "mov,mp4,m4a,3gp,3g2,mj2", duration, streams };
}

export function audioProbe(duration: number): ProbeResult {
  return {
    formatName: "mp3",
    duration,
    streams: [{ codecType: "audio", codecName: "mp3", duration }],
  };
}

/** Fresh storage root for one test; returns a cleanup callback. */
export function useTempStorage(prefix: string): { root: string; restore: () => void } {
  const originalEnv = process.env.RENDER_ENV;
  const originalStoragePath = process.env.MEDIA_STORAGE_PATH;
  const root = fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
  process.env.RENDER_ENV = "test";
  process.env.MEDIA_STORAGE_PATH = root;
  return {
    root,
    restore: () => {
      fs.rmSync(root, { recursive: true, force: true });
      restoreEnv("RENDER_ENV", originalEnv);
      restoreEnv("MEDIA_STORAGE_PATH", originalStoragePath);
    },
  };
}

function restoreEnv(name: string, value: string | undefined) {
  if (value === undefined) {
    delete process.env[name];
  } else {
    process.env[name] = value;
  }
}

/** Creates an empty file so existence checks pass. */
export function touch(dir: string, name: string): string {
  const p = path.join(dir, name);
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, "");
  return p;
}
