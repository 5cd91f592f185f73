// backend/services/video-composition/transitions.ts
import type { TransitionKind } from "./catalog.js";
import { TransitionError } from "./errors.js";
import type { Size } from "./types.js";

export interface ClipTiming {
  duration: number;
}

/**
 * State of one layer at an instant. Offsets are fractions of the frame
 * (1 = one full frame width or height); `visible` is the horizontal band of
 * the layer that shows, used by wipes.
 */
export interface LayerState {
  opacity: number;
  offsetX: number;
  offsetY: number;
  scale: number;
  visible: { from: number; to: number };
}

export interface CompositeFrame {
  a: LayerState | null;
  b: LayerState | null;
}

export interface FilterLabels {
  inputA: string;
  inputB: string;
  output: string;
  frame: Size;
  /** Where clip A starts on the stream feeding inputA, in seconds. */
  timelineOffset?: number;
}

export interface CompositeSpec {
  kind: TransitionKind;
  /** Seconds during which both clips are on screen. */
  overlap: number;
  /** Start of clip B, measured from the start of clip A. */
  offset: number;
  duration: number;
  sample(t: number): CompositeFrame;
  filter(labels: FilterLabels): string;
}

const FULL: LayerState = Object.freeze({
  opacity: 1,
  offsetX: 0,
  offsetY: 0,
  scale: 1,
  visible: Object.freeze({ from: 0, to: 1 }),
});

const XFADE_NAMES: Partial<Record<TransitionKind, string>> = {
  fade: "fade",
  dissolve: "dissolve",
  slide_left: "slideleft",
  slide_right: "slideright",
  slide_up: "slideup",
  slide_down: "slidedown",
  wipe_left: "wipeleft",
  wipe_right: "wiperight",
  zoom_in: "fade",
  zoom_out: "fade",
};

function layer(overrides: Partial<LayerState>): LayerState {
  return { ...FULL, ...overrides };
}

function assertClip(clip: ClipTiming, name: string): void {
  if (!Number.isFinite(clip.duration) || clip.duration <= 0) {
    throw new TransitionError(
      `${name} has invalid duration ${String(clip.duration)}`
    );
  }
}

/**
 * Overlap actually used between two clips. The requested duration is kept
 * while both clips are longer than it; otherwise the overlap shrinks to half
 * of the shorter clip so neither clip is swallowed by the blend.
 *
 * Either clip can trigger the reduction, including a short clip B. A
 * composite then lasts dA + dB - min(dA, dB) / 2 rather than dA + dB - d, so
 * `dA + dB - d` holds only while both clips are longer than `d`.
 */
export function effectiveTransitionDuration(
  durationA: number,
  durationB: number,
  requested: number
): number {
  const shorter = Math.min(durationA, durationB);
  return requested < shorter ? requested : shorter * 0.5;
}

function seconds(n: number): string {
  return n.toFixed(3);
}

function sampleBlend(kind: TransitionKind, p: number): CompositeFrame {
  switch (kind) {
    case "none":
      return p < 1 ? { a: FULL, b: null } : { a: null, b: FULL };
    case "fade":
    case "dissolve":
      return { a: layer({ opacity: 1 - p }), b: layer({ opacity: p }) };
    case "slide_left":
      return { a: FULL, b: layer({ offsetX: 1 - p }) };
    case "slide_right":
      return { a: FULL, b: layer({ offsetX: -(1 - p) }) };
    case "slide_up":
      return { a: FULL, b: layer({ offsetY: 1 - p }) };
    case "slide_down":
      return { a: FULL, b: layer({ offsetY: -(1 - p) }) };
    case "zoom_in":
      return {
        a: layer({ opacity: 1 - p }),
        b: layer({ opacity: p, scale: 0.8 + 0.2 * p }),
      };
    case "zoom_out":
      return {
        a: layer({ opacity: 1 - p, scale: 1 + 0.2 * p }),
        b: layer({ opacity: p }),
      };
    case "wipe_left":
      return { a: FULL, b: layer({ visible: { from: 1 - p, to: 1 } }) };
    case "wipe_right":
      return { a: FULL, b: layer({ visible: { from: 0, to: p } }) };
    default: {
      const unknownKind: never = kind;
      throw new TransitionError(`unsupported transition ${String(unknownKind)}`);
    }
  }
}

function blendFilter(
  kind: TransitionKind,
  overlap: number,
  offset: number,
  labels: FilterLabels
): string {
  const { inputA, inputB, output, frame } = labels;
  const start = (labels.timelineOffset ?? 0) + offset;
  const d = seconds(overlap);
  const o = seconds(start);

  if (kind === "none") {
    return `[${inputA}][${inputB}]concat=n=2:v=1:a=0[${output}]`;
  }

  const xfade = `xfade=transition=${XFADE_NAMES[kind] ?? "fade"}:duration=${d}:offset=${o}`;

  if (kind === "zoom_in") {
    const grow = `trunc(${frame.width}*(0.8+0.2*min(1,t/${d}))/2)*2`;
    const growH = `trunc(${frame.height}*(0.8+0.2*min(1,t/${d}))/2)*2`;
    return (
      `[${inputB}]scale=w='${grow}':h='${growH}':eval=frame,` +
      `pad=${frame.width}:${frame.height}:(ow-iw)/2:(oh-ih)/2:color=black[${output}_zb];` +
      `[${inputA}][${output}_zb]${xfade}[${output}]`
    );
  }

  if (kind === "zoom_out") {
    const factor = `(1+0.2*min(1,max(0,(t-${o})/${d})))`;
    return (
      `[${inputA}]scale=w='trunc(${frame.width}*${factor}/2)*2':h='trunc(${frame.height}*${factor}/2)*2':eval=frame,` +
      `crop=${frame.width}:${frame.height}[${output}_za];` +
      `[${output}_za][${inputB}]${xfade}[${output}]`
    );
  }

  return `[${inputA}][${inputB}]${xfade}[${output}]`;
}

/**
 * Composes two adjacent clips. The composite lasts
 * duration(A) + duration(B) - overlap, where the overlap is zero for "none".
 */
export function applyTransition(
  clipA: ClipTiming,
  clipB: ClipTiming,
  kind: TransitionKind,
  duration: number
): CompositeSpec {
  assertClip(clipA, "clip A");
  assertClip(clipB, "clip B");
  if (kind !== "none" && (!Number.isFinite(duration) || duration <= 0)) {
    throw new TransitionError(
      `transition duration must be positive, got ${String(duration)}`
    );
  }

  const overlap =
    kind === "none"
      ? 0
      : effectiveTransitionDuration(clipA.duration, clipB.duration, duration);
  const offset = clipA.duration - overlap;
  const total = clipA.duration + clipB.duration - overlap;

  // Throws for an unknown kind.
  sampleBlend(kind, 0);

  return {
    kind,
    overlap,
    offset,
    duration: total,
    sample(t: number): CompositeFrame {
      if (t < offset) {
        return { a: FULL, b: null };
      }
      if (overlap === 0 || t >= offset + overlap) {
        return { a: null, b: FULL };
      }
      return sampleBlend(kind, (t - offset) / overlap);
    },
    filter(labels: FilterLabels): string {
      return blendFilter(kind, overlap, offset, labels);
    },
  };
}

export interface TransitionChain {
  duration: number;
  /** Start of each clip on the composite timeline. */
  starts: number[];
  /** Overlap between clip i and clip i + 1. */
  overlaps: number[];
  steps: CompositeSpec[];
}

/**
 * Folds a clip sequence through the engine in order. Each overlap is limited
 * to the part of the previous clip not already spent on its own incoming
 * transition, so consecutive blends never collide.
 */
export function chainTransitions(
  clips: readonly ClipTiming[],
  kind: TransitionKind,
  duration: number
): TransitionChain {
  if (clips.length === 0) {
    return { duration: 0, starts: [], overlaps: [], steps: [] };
  }
  assertClip(clips[0], "clip 0");

  const starts = [0];
  const overlaps: number[] = [];
  const steps: CompositeSpec[] = [];
  let total = clips[0].duration;
  let incoming = 0;

  for (let i = 1; i < clips.length; i++) {
    const previous = clips[i - 1];
    const next = clips[i];
    const tail = { duration: previous.duration - incoming };
    const step = applyTransition(tail, next, kind, duration);
    steps.push(step);
    overlaps.push(step.overlap);
    starts.push(total - step.overlap);
    total += next.duration - step.overlap;
    incoming = step.overlap;
  }

  return { duration: total, starts, overlaps, steps };
}
