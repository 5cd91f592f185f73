// backend/services/video-composition/effects.ts
import type { EffectKind } from "./catalog.js";
import { EffectError } from "./errors.js";
import type { Size } from "./types.js";

export const KEN_BURNS_RATIO = 1.2;
export const ZOOM_RATIO = 1.3;
export const PAN_SCALE = 1.1;
export const SHAKE_SCALE = 1.04;
/** Peak jitter, as a fraction of the frame's shorter side. */
export const SHAKE_AMPLITUDE = 0.01;

export interface EffectClip {
  size: Size;
  fps: number;
}

/**
 * The visible window inside the source frame at an instant, in source
 * pixels. The window is scaled back up to the full frame on output.
 */
export interface EffectWindow {
  scale: number;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface EffectSpec {
  kind: EffectKind;
  duration: number;
  sample(t: number): EffectWindow;
  filters: string[];
}

/** Deterministic per-frame noise in [0, 1). */
export function frameNoise(n: number): number {
  const v = Math.sin(n * 12.9898) * 43758.5453;
  return v - Math.floor(v);
}

function clamp01(n: number): number {
  return Math.min(1, Math.max(0, n));
}

function centredWindow(size: Size, scale: number): EffectWindow {
  const width = size.width / scale;
  const height = size.height / scale;
  return {
    scale,
    x: (size.width - width) / 2,
    y: (size.height - height) / 2,
    width,
    height,
  };
}

function zoomFilters(
  clip: EffectClip,
  duration: number,
  from: number,
  to: number
): string[] {
  const frames = Math.max(1, Math.round(duration * clip.fps));
  const { width, height } = clip.size;
  return [
    `zoompan=z='${from}+${(to - from).toFixed(4)}*on/${frames}':` +
      `x='iw/2-(iw/zoom/2)':y='ih/2-(ih/zoom/2)':d=1:s=${width}x${height}:fps=${clip.fps}`,
  ];
}

function panFilters(clip: EffectClip, duration: number, kind: EffectKind): string[] {
  const { width, height } = clip.size;
  const d = duration.toFixed(3);
  const progress = `min(1,t/${d})`;
  const moves: Record<string, [string, string]> = {
    pan_left: [`(iw-ow)*(1-${progress})`, "(ih-oh)/2"],
    pan_right: [`(iw-ow)*${progress}`, "(ih-oh)/2"],
    pan_up: ["(iw-ow)/2", `(ih-oh)*(1-${progress})`],
    pan_down: ["(iw-ow)/2", `(ih-oh)*${progress}`],
  };
  const [x, y] = moves[kind] ?? ["(iw-ow)/2", "(ih-oh)/2"];
  return [
    `scale=${Math.round(width * PAN_SCALE)}:${Math.round(height * PAN_SCALE)}`,
    `crop=${width}:${height}:x='${x}':y='${y}'`,
  ];
}

function shakeAmplitude(size: Size): number {
  const margin = Math.min(
    (size.width * SHAKE_SCALE - size.width) / 2,
    (size.height * SHAKE_SCALE - size.height) / 2
  );
  return Math.min(margin, Math.min(size.width, size.height) * SHAKE_AMPLITUDE);
}

function shakeFilters(clip: EffectClip): string[] {
  const { width, height } = clip.size;
  const amp = shakeAmplitude(clip.size).toFixed(2);
  const noise = (seed: string) =>
    `(2*mod(abs(sin((n+${seed})*12.9898)*43758.5453),1)-1)`;
  return [
    `scale=${Math.round(width * SHAKE_SCALE)}:${Math.round(height * SHAKE_SCALE)}`,
    `crop=${width}:${height}:x='(iw-ow)/2+${amp}*${noise("0")}':y='(ih-oh)/2+${amp}*${noise("7919")}'`,
  ];
}

/**
 * Time-varying camera motion for one clip.
 *
 * Ken Burns and zoom effects scale the window about the centre over the
 * whole clip. Pans sweep a window across the excess of a slightly enlarged
 * frame, edge to edge. Shake adds bounded per-frame jitter that never lets
 * the window leave the frame.
 */
export function applyEffect(
  clip: EffectClip,
  kind: EffectKind | null,
  duration: number
): EffectSpec {
  const { width, height } = clip.size;
  if (!(width > 0) || !(height > 0)) {
    throw new EffectError(`invalid clip size ${width}x${height}`);
  }
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new EffectError(`invalid clip duration ${String(duration)}`);
  }
  if (!(clip.fps > 0)) {
    throw new EffectError(`invalid frame rate ${String(clip.fps)}`);
  }

  const effect: EffectKind = kind ?? "none";
  const progress = (t: number) => clamp01(t / duration);
  const zoom = (from: number, to: number): EffectSpec => ({
    kind: effect,
    duration,
    sample: t => centredWindow(clip.size, from + (to - from) * progress(t)),
    filters: zoomFilters(clip, duration, from, to),
  });

  switch (effect) {
    case "none":
      return {
        kind: effect,
        duration,
        sample: () => centredWindow(clip.size, 1),
        filters: [],
      };
    case "ken_burns_in":
      return zoom(1, KEN_BURNS_RATIO);
    case "ken_burns_out":
      return zoom(KEN_BURNS_RATIO, 1);
    case "zoom_in":
      return zoom(1, ZOOM_RATIO);
    case "zoom_out":
      return zoom(ZOOM_RATIO, 1);
    case "pan_left":
    case "pan_right":
    case "pan_up":
    case "pan_down": {
      const window = centredWindow(clip.size, PAN_SCALE);
      const spanX = width - window.width;
      const spanY = height - window.height;
      return {
        kind: effect,
        duration,
        sample: t => {
          const p = progress(t);
          switch (effect) {
            case "pan_left":
              return { ...window, x: spanX * (1 - p) };
            case "pan_right":
              return { ...window, x: spanX * p };
            case "pan_up":
              return { ...window, y: spanY * (1 - p) };
            case "pan_down":
              return { ...window, y: spanY * p };
          }
        },
        filters: panFilters(clip, duration, effect),
      };
    }
    case "shake": {
      const window = centredWindow(clip.size, SHAKE_SCALE);
      const amp = shakeAmplitude(clip.size) / SHAKE_SCALE;
      return {
        kind: effect,
        duration,
        sample: t => {
          const n = Math.floor(t * clip.fps);
          return {
            ...window,
            x: window.x + amp * (2 * frameNoise(n) - 1),
            y: window.y + amp * (2 * frameNoise(n + 7919) - 1),
          };
        },
        filters: shakeFilters(clip),
      };
    }
    default: {
      const unknownKind: never = effect;
      throw new EffectError(`unsupported effect ${String(unknownKind)}`);
    }
  }
}
