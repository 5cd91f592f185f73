// backend/services/video-composition/media-adapter.ts
import type { FitMode } from "./catalog.js";
import { MediaAdapterError } from "./errors.js";
import type { MediaAsset, Rect, Size } from "./types.js";

export const DEFAULT_BACKGROUND = "#000000";

/**
 * How one source is brought to the render size. `content` is where the
 * source picture ends up inside the output frame; for crop it covers the
 * whole frame, for fit it is the letterboxed or pillarboxed block.
 */
export interface AdaptedClipSpec {
  fitMode: FitMode;
  source: Size;
  output: Size;
  scaled: Size;
  crop?: Rect;
  pad?: { x: number; y: number; color: string };
  content: Rect;
  filters: string[];
}

function isUsableDimension(n: number): boolean {
  return Number.isFinite(n) && n > 0;
}

/** Converts "#RRGGBB" to ffmpeg's "0xRRGGBB" color syntax. */
export function ffmpegColor(color: string): string {
  return /^#[0-9A-Fa-f]{6}$/.test(color) ? `0x${color.slice(1)}` : color;
}

/**
 * Rejects assets the adapter cannot work with: zero or missing dimensions,
 * and video with no playable duration.
 */
export function assertAdaptable(asset: MediaAsset): void {
  if (!isUsableDimension(asset.width) || !isUsableDimension(asset.height)) {
    throw new MediaAdapterError(
      `invalid dimensions ${asset.width}x${asset.height}`,
      asset.path
    );
  }
  if (
    asset.kind === "video" &&
    (asset.duration === undefined || !(asset.duration > 0))
  ) {
    throw new MediaAdapterError("video has zero duration", asset.path);
  }
}

export function adaptMedia(
  source: Size,
  target: Size,
  fitMode: FitMode,
  background: string = DEFAULT_BACKGROUND
): AdaptedClipSpec {
  if (!isUsableDimension(source.width) || !isUsableDimension(source.height)) {
    throw new MediaAdapterError(
      `invalid source size ${source.width}x${source.height}`
    );
  }
  if (!isUsableDimension(target.width) || !isUsableDimension(target.height)) {
    throw new MediaAdapterError(
      `invalid target size ${target.width}x${target.height}`
    );
  }

  const output: Size = { width: target.width, height: target.height };
  const sx = target.width / source.width;
  const sy = target.height / source.height;

  switch (fitMode) {
    case "crop": {
      const scale = Math.max(sx, sy);
      const scaled: Size = {
        width: Math.max(target.width, Math.round(source.width * scale)),
        height: Math.max(target.height, Math.round(source.height * scale)),
      };
      const crop: Rect = {
        x: Math.floor((scaled.width - target.width) / 2),
        y: Math.floor((scaled.height - target.height) / 2),
        width: target.width,
        height: target.height,
      };
      return {
        fitMode,
        source,
        output,
        scaled,
        crop,
        content: { x: 0, y: 0, ...output },
        filters: [
          `scale=${scaled.width}:${scaled.height}`,
          `crop=${crop.width}:${crop.height}:${crop.x}:${crop.y}`,
          "setsar=1",
        ],
      };
    }
    case "fit": {
      const scale = Math.min(sx, sy);
      const scaled: Size = {
        width: Math.min(
          target.width,
          Math.max(1, Math.round(source.width * scale))
        ),
        height: Math.min(
          target.height,
          Math.max(1, Math.round(source.height * scale))
        ),
      };
      const x = Math.floor((target.width - scaled.width) / 2);
      const y = Math.floor((target.height - scaled.height) / 2);
      const color = ffmpegColor(background);
      return {
        fitMode,
        source,
        output,
        scaled,
        pad: { x, y, color },
        content: { x, y, ...scaled },
        filters: [
          `scale=${scaled.width}:${scaled.height}`,
          `pad=${target.width}:${target.height}:${x}:${y}:color=${color}`,
          "setsar=1",
        ],
      };
    }
    case "stretch":
      return {
        fitMode,
        source,
        output,
        scaled: { ...output },
        content: { x: 0, y: 0, ...output },
        filters: [`scale=${target.width}:${target.height}`, "setsar=1"],
      };
    default: {
      const unknownMode: never = fitMode;
      throw new MediaAdapterError(`unsupported fit mode ${String(unknownMode)}`);
    }
  }
}
