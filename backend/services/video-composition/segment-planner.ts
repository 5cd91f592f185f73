// backend/services/video-composition/segment-planner.ts
import type { TransitionKind } from "./catalog.js";
import { TransitionError } from "./errors.js";
import { applyTransition } from "./transitions.js";
import type { MediaAsset } from "./types.js";

export interface PlannedSegment {
  asset: MediaAsset;
  /** Position of the asset in the usable asset list. */
  assetIndex: number;
  /** How many times the asset list has been cycled before this segment. */
  pass: number;
  /** Trim start inside a video asset; 0 for images. */
  sourceStart: number;
  duration: number;
  /** True when a video shorter than the segment must be looped. */
  loop: boolean;
}

export interface PlanOptions {
  /** Seconds the finished video has to cover, usually the narration length. */
  targetDuration: number;
  clipMinDuration: number;
  clipMaxDuration: number;
  transition: TransitionKind;
  transitionDuration: number;
}

export interface SegmentPlan {
  segments: PlannedSegment[];
  /** Length of the composite after transitions. */
  duration: number;
}

/** Nominal segment length: the middle of the configured clip bounds. */
export function nominalSegmentDuration(min: number, max: number): number {
  return (min + max) / 2;
}

/**
 * Upper bound on the segments needed to cover `target`. Every segment lasts
 * at least `clipMin` and an overlap never exceeds what is left of the
 * previous clip, so any two consecutive segments add at least `clipMin`.
 */
export function segmentLimit(
  target: number,
  clipMin: number,
  assetCount: number
): number {
  return assetCount + 2 * Math.ceil(target / clipMin) + 3;
}

function trimStart(asset: MediaAsset, index: number, duration: number): number {
  if (asset.kind !== "video" || asset.duration === undefined) {
    return 0;
  }
  const slack = asset.duration - duration;
  if (slack <= 0) {
    return 0;
  }
  return Math.round(((index * duration) % Math.max(1, slack)) * 1000) / 1000;
}

/**
 * Selects the segment sequence for a render.
 *
 * Assets are visited round-robin in upload order, so a clip only repeats
 * back-to-back when a single asset is usable. Each segment lasts the middle
 * of the clip bounds; a video asset is trimmed from a different offset on
 * each visit, or looped when shorter than the segment. Segments are added
 * until the composite, after transition overlaps, covers the target
 * duration; the last one is shortened to what is still missing but never
 * below the minimum clip length. Every asset is used at least once.
 * Throws TransitionError when the plan cannot reach the target.
 */
export function planSegments(
  assets: readonly MediaAsset[],
  options: PlanOptions
): SegmentPlan {
  if (assets.length === 0) {
    return { segments: [], duration: 0 };
  }
  const target = options.targetDuration;
  if (!Number.isFinite(target) || target < 0) {
    throw new TransitionError(`cannot plan segments for ${String(target)} seconds`);
  }
  if (!(options.clipMinDuration > 0)) {
    throw new TransitionError(
      `minimum clip length must be positive, got ${String(options.clipMinDuration)}`
    );
  }

  const nominal = nominalSegmentDuration(
    options.clipMinDuration,
    options.clipMaxDuration
  );
  const kind = options.transition;
  const limit = segmentLimit(target, options.clipMinDuration, assets.length);
  const segments: PlannedSegment[] = [];
  let covered = 0;
  // Overlap already taken from the end of the previous segment
  let incoming = 0;

  while (
    segments.length < limit &&
    (covered < target || segments.length < assets.length)
  ) {
    const index = segments.length;
    const assetIndex = index % assets.length;
    const asset = assets[assetIndex];

    let duration = nominal;
    if (index > 0 && segments.length >= assets.length - 1) {
      const missing = target - covered;
      const overlap = kind === "none" ? 0 : options.transitionDuration;
      if (missing > 0) {
        duration = Math.min(
          nominal,
          Math.max(options.clipMinDuration, missing + overlap)
        );
      }
    }

    if (index === 0) {
      covered = duration;
    } else {
      const previous = segments[index - 1];
      const step = applyTransition(
        { duration: previous.duration - incoming },
        { duration },
        kind,
        options.transitionDuration
      );
      covered += duration - step.overlap;
      incoming = step.overlap;
    }

    segments.push({
      asset,
      assetIndex,
      pass: Math.floor(index / assets.length),
      sourceStart: trimStart(asset, index, duration),
      duration,
      loop:
        asset.kind === "video" &&
        asset.duration !== undefined &&
        asset.duration < duration,
    });
  }

  if (covered < target) {
    throw new TransitionError(
      `segment plan covers ${covered.toFixed(3)}s of ${target.toFixed(3)}s`
    );
  }
  return { segments, duration: covered };
}
