// backend/services/video-composition/encoding.ts
import { defaultCatalog, type Catalog, type OutputQuality } from "./catalog.js";
import { EncodingError } from "./errors.js";
import type { ProbeResult, Size } from "./types.js";

/** Accepted gap between the planned and the encoded duration, in seconds. */
export const DURATION_TOLERANCE = 0.5;

export function videoBitrate(
  quality: OutputQuality,
  catalog: Catalog = defaultCatalog
): string {
  return catalog.outputQualities[quality].videoBitrate;
}

/** Output options for an H.264/AAC MP4 at the quality's bitrate tier. */
export function encodingArgs(
  quality: OutputQuality,
  fps: number,
  catalog: Catalog = defaultCatalog
): string[] {
  return [
    "-c:v",
    "libx264",
    "-preset",
    "medium",
    "-b:v",
    videoBitrate(quality, catalog),
    "-pix_fmt",
    "yuv420p",
    "-r",
    String(fps),
    "-c:a",
    "aac",
    "-b:a",
    "192k",
    "-movflags",
    "+faststart",
  ];
}

/**
 * Checks an encoded file's probe against what was planned. Throws
 * EncodingError when the container lacks H.264 video or audio, the frame
 * size differs, or the duration is off by more than the tolerance.
 */
export function verifyOutput(
  probe: ProbeResult,
  expected: { size: Size; duration: number }
): void {
  const video = probe.streams.find(s => s.codecType === "video");
  if (!video) {
    throw new EncodingError("output has no video stream");
  }
  if (video.codecName !== undefined && video.codecName !== "h264") {
    throw new EncodingError(`unexpected video codec ${video.codecName}`);
  }
  if (!probe.streams.some(s => s.codecType === "audio")) {
    throw new EncodingError("output has no audio stream");
  }
  if (
    video.width !== expected.size.width ||
    video.height !== expected.size.height
  ) {
    throw new EncodingError(
      `output is ${video.width}x${video.height}, expected ${expected.size.width}x${expected.size.height}`
    );
  }
  if (Math.abs(probe.duration - expected.duration) > DURATION_TOLERANCE) {
    throw new EncodingError(
      `output lasts ${probe.duration.toFixed(2)}s, expected ${expected.duration.toFixed(2)}s`
    );
  }
}
