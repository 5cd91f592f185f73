// backend/services/video-composition/media-probe.ts
import fs from "node:fs";
import path from "node:path";
import type { MediaRunner } from "../../lib/ffmpeg-runtime.js";
import type { RetryPolicy } from "../../lib/retry-policy.js";
import { defaultCatalog, type Catalog } from "./catalog.js";
import { MediaAdapterError, MediaNotFoundError, isCompositionError } from "./errors.js";
import { assertAdaptable } from "./media-adapter.js";
import type { MediaAsset, MediaKind, MediaReference, ProbeResult } from "./types.js";

export function mediaKindForPath(
  filePath: string,
  catalog: Catalog = defaultCatalog
): MediaKind | null {
  const ext = path.extname(filePath).toLowerCase();
  if (catalog.videoExtensions.includes(ext)) {
    return "video";
  }
  if (catalog.imageExtensions.includes(ext)) {
    return "image";
  }
  return null;
}

function positive(n: number | undefined): n is number {
  return n !== undefined && Number.isFinite(n) && n > 0;
}

/**
 * Builds a MediaAsset from ffprobe output. Every field the renderer relies
 * on is checked; anything missing or non-positive is a MediaAdapterError.
 */
export function mediaInfoFromProbe(
  filePath: string,
  kind: MediaKind,
  probe: ProbeResult
): MediaAsset {
  const video = probe.streams.find(s => s.codecType === "video");
  if (!video) {
    throw new MediaAdapterError("no video stream", filePath);
  }
  if (!positive(video.width) || !positive(video.height)) {
    throw new MediaAdapterError("missing frame size", filePath);
  }
  if (kind === "image") {
    return { path: filePath, kind, width: video.width, height: video.height };
  }

  const duration = positive(probe.duration) ? probe.duration : video.duration;
  if (!positive(duration)) {
    throw new MediaAdapterError("missing duration", filePath);
  }
  return {
    path: filePath,
    kind,
    duration,
    width: video.width,
    height: video.height,
    ...(positive(video.fps) ? { fps: video.fps } : {}),
  };
}

export interface ProbeMediaOptions {
  catalog?: Catalog;
  retry?: RetryPolicy;
}

/**
 * Turns an upload reference into a MediaAsset, probing the file when the
 * reference lacks metadata. Throws MediaNotFoundError for missing files and
 * MediaAdapterError for unsupported or unreadable ones.
 */
export async function probeMedia(
  runner: MediaRunner,
  ref: MediaReference,
  options: ProbeMediaOptions = {}
): Promise<MediaAsset> {
  const kind = mediaKindForPath(ref.path, options.catalog) ?? ref.kind;
  if (!kind) {
    throw new MediaAdapterError(
      `unsupported file type ${path.extname(ref.path) || "(none)"}`,
      ref.path
    );
  }
  if (!fs.existsSync(ref.path)) {
    throw new MediaNotFoundError(ref.path);
  }

  const { width, height, duration, fps } = ref;
  let asset: MediaAsset;
  if (
    positive(width) &&
    positive(height) &&
    (kind === "image" || positive(duration))
  ) {
    // Caller-supplied metadata is trusted; no probe needed
    asset = {
      path: ref.path,
      kind,
      width,
      height,
      ...(kind === "video" ? { duration } : {}),
      ...(positive(fps) ? { fps } : {}),
    };
  } else {
    let probe: ProbeResult;
    try {
      probe = options.retry
        ? await options.retry.execute(() => runner.probe(ref.path), `probe ${ref.path}`)
        : await runner.probe(ref.path);
    } catch (error) {
      throw new MediaAdapterError(
        `probe failed: ${error instanceof Error ? error.message : String(error)}`,
        ref.path,
        error
      );
    }
    asset = mediaInfoFromProbe(ref.path, kind, probe);
  }

  assertAdaptable(asset);
  return asset;
}

export interface AcquiredMedia {
  assets: MediaAsset[];
  warnings: string[];
}

/**
 * Probes every reference in upload order. Missing and unusable assets are
 * skipped with a warning; any other failure propagates.
 */
export async function acquireMedia(
  runner: MediaRunner,
  refs: readonly MediaReference[],
  options: ProbeMediaOptions = {}
): Promise<AcquiredMedia> {
  const assets: MediaAsset[] = [];
  const warnings: string[] = [];
  for (const ref of refs) {
    try {
      assets.push(await probeMedia(runner, ref, options));
    } catch (error) {
      if (isCompositionError(error) && !error.fatal) {
        warnings.push(error.userMessage);
        continue;
      }
      throw error;
    }
  }
  return { assets, warnings };
}
