// backend/services/video-composition/color.ts
import { defaultCatalog, type Catalog, type ColorFilterKind } from "./catalog.js";
import { EffectError } from "./errors.js";

/** Linear RGB triple, each channel in [0, 1]. */
export type Rgb = readonly [number, number, number];

/** Normalised position in the frame, (0, 0) top left to (1, 1) bottom right. */
export interface FramePoint {
  x: number;
  y: number;
}

export interface ColorAdjustSpec {
  filter: ColorFilterKind;
  brightness: number;
  contrast: number;
  saturation: number;
  filters: string[];
  pixel(rgb: Rgb, at?: FramePoint): Rgb;
}

function clamp(n: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, n));
}

function luma([r, g, b]: Rgb): number {
  return 0.299 * r + 0.587 * g + 0.114 * b;
}

function channelMap(rgb: Rgb, fn: (c: number, i: number) => number): Rgb {
  return [fn(rgb[0], 0), fn(rgb[1], 1), fn(rgb[2], 2)];
}

function desaturate(rgb: Rgb, amount: number): Rgb {
  const l = luma(rgb);
  return channelMap(rgb, c => l + (c - l) * (1 - amount));
}

function sCurve(c: number): number {
  return c < 0.5 ? 2 * c * c : 1 - 2 * (1 - c) * (1 - c);
}

function vignette(at: FramePoint | undefined): number {
  if (!at) {
    return 1;
  }
  const dx = at.x - 0.5;
  const dy = at.y - 0.5;
  return 1 - 0.6 * (dx * dx + dy * dy);
}

const WARM = [1.1, 1.0, 0.9] as const;
const COOL = [0.9, 1.0, 1.1] as const;

function namedFilterPixel(
  filter: ColorFilterKind,
  rgb: Rgb,
  at?: FramePoint
): Rgb {
  switch (filter) {
    case "none":
      return rgb;
    case "grayscale": {
      const l = luma(rgb);
      return [l, l, l];
    }
    case "vintage": {
      const v = vignette(at);
      return channelMap(desaturate(rgb, 0.5), (c, i) => c * WARM[i] * v);
    }
    case "warm":
      return channelMap(rgb, (c, i) => c * WARM[i]);
    case "cool":
      return channelMap(rgb, (c, i) => c * COOL[i]);
    case "high_contrast":
      return channelMap(rgb, sCurve);
    case "soft":
      return channelMap(rgb, c => c * 0.9 + 0.1);
    default: {
      const unknownFilter: never = filter;
      throw new EffectError(`unsupported color filter ${String(unknownFilter)}`);
    }
  }
}

function namedFilterChain(filter: ColorFilterKind): string[] {
  switch (filter) {
    case "none":
      return [];
    case "grayscale":
      return ["hue=s=0"];
    case "vintage":
      return [
        "eq=saturation=0.5",
        "colorchannelmixer=rr=1.1:bb=0.9",
        "vignette=PI/5",
      ];
    case "warm":
      return ["colorchannelmixer=rr=1.1:bb=0.9"];
    case "cool":
      return ["colorchannelmixer=rr=0.9:bb=1.1"];
    case "high_contrast":
      return ["curves=preset=strong_contrast"];
    case "soft":
      return ["gblur=sigma=1.5", "colorlevels=romin=0.1:gomin=0.1:bomin=0.1"];
    default: {
      const unknownFilter: never = filter;
      throw new EffectError(`unsupported color filter ${String(unknownFilter)}`);
    }
  }
}

/**
 * Static color treatment for one clip: the named filter first, then
 * brightness (multiplicative), contrast (about mid grey) and saturation
 * (about luma). Each numeric adjustment is clamped to its catalog range.
 * The result describes a transform of the render copy; the source file is
 * never rewritten.
 */
export function applyColorAdjust(
  filter: ColorFilterKind,
  brightness: number,
  contrast: number,
  saturation: number,
  catalog: Catalog = defaultCatalog
): ColorAdjustSpec {
  for (const [name, value] of [
    ["brightness", brightness],
    ["contrast", contrast],
    ["saturation", saturation],
  ] as const) {
    if (!Number.isFinite(value)) {
      throw new EffectError(`${name} must be a finite number`);
    }
  }
  if (!(filter in catalog.colorFilters)) {
    throw new EffectError(`unsupported color filter ${filter}`);
  }

  const { ranges } = catalog;
  const b = clamp(brightness, ranges.brightness.min, ranges.brightness.max);
  const c = clamp(contrast, ranges.contrast.min, ranges.contrast.max);
  const s = clamp(saturation, ranges.saturation.min, ranges.saturation.max);

  const filters = namedFilterChain(filter);
  if (b !== 1) {
    filters.push(`colorchannelmixer=rr=${b}:gg=${b}:bb=${b}`);
  }
  if (c !== 1 || s !== 1) {
    filters.push(`eq=contrast=${c}:saturation=${s}`);
  }

  return {
    filter,
    brightness: b,
    contrast: c,
    saturation: s,
    filters,
    pixel(rgb: Rgb, at?: FramePoint): Rgb {
      let out = namedFilterPixel(filter, rgb, at);
      out = channelMap(out, v => v * b);
      out = channelMap(out, v => (v - 0.5) * c + 0.5);
      const l = luma(out);
      out = channelMap(out, v => l + (v - l) * s);
      return channelMap(out, v => clamp(v, 0, 1));
    },
  };
}
