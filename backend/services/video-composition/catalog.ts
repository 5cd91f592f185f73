// backend/services/video-composition/catalog.ts
import type { VideoTaskConfig } from "./types.js";

export const RESOLUTIONS = ["480p", "720p", "1080p", "2k", "4k"] as const;
export const LAYOUTS = ["9:16", "3:4", "1:1", "4:3", "16:9", "21:9"] as const;
export const FRAME_RATES = [24, 25, 30, 50, 60] as const;
export const FIT_MODES = ["crop", "fit", "stretch"] as const;
export const TRANSITION_KINDS = [
  "none",
  "fade",
  "slide_left",
  "slide_right",
  "slide_up",
  "slide_down",
  "zoom_in",
  "zoom_out",
  "dissolve",
  "wipe_left",
  "wipe_right",
] as const;
export const EFFECT_KINDS = [
  "none",
  "ken_burns_in",
  "ken_burns_out",
  "zoom_in",
  "zoom_out",
  "pan_left",
  "pan_right",
  "pan_up",
  "pan_down",
  "shake",
] as const;
export const COLOR_FILTER_KINDS = [
  "none",
  "grayscale",
  "vintage",
  "warm",
  "cool",
  "high_contrast",
  "soft",
] as const;
export const SUBTITLE_POSITIONS = [
  "top",
  "center",
  "bottom",
  "top_left",
  "top_right",
  "left",
  "right",
  "bottom_left",
  "bottom_right",
] as const;
export const OUTPUT_QUALITIES = ["low", "medium", "high", "ultra"] as const;
export const PLATFORM_PRESET_NAMES = [
  "douyin",
  "kuaishou",
  "xiaohongshu",
  "bilibili",
  "youtube",
  "instagram_reels",
  "instagram_feed",
  "weixin",
] as const;

export type Resolution = (typeof RESOLUTIONS)[number];
export type Layout = (typeof LAYOUTS)[number];
export type FrameRate = (typeof FRAME_RATES)[number];
export type FitMode = (typeof FIT_MODES)[number];
export type TransitionKind = (typeof TRANSITION_KINDS)[number];
export type EffectKind = (typeof EFFECT_KINDS)[number];
export type ColorFilterKind = (typeof COLOR_FILTER_KINDS)[number];
export type SubtitlePosition = (typeof SUBTITLE_POSITIONS)[number];
export type OutputQuality = (typeof OUTPUT_QUALITIES)[number];
export type PlatformPresetName = (typeof PLATFORM_PRESET_NAMES)[number];

export type NumericField =
  | "clipMinDuration"
  | "clipMaxDuration"
  | "transitionDuration"
  | "subtitleSize"
  | "subtitleStrokeWidth"
  | "subtitleLineSpacing"
  | "brightness"
  | "contrast"
  | "saturation"
  | "bgmVolume"
  | "bgmFadeIn"
  | "bgmFadeOut";

export const NUMERIC_FIELDS: readonly NumericField[] = [
  "clipMinDuration",
  "clipMaxDuration",
  "transitionDuration",
  "subtitleSize",
  "subtitleStrokeWidth",
  "subtitleLineSpacing",
  "brightness",
  "contrast",
  "saturation",
  "bgmVolume",
  "bgmFadeIn",
  "bgmFadeOut",
];

export interface NumericRange {
  min: number;
  max: number;
  integer?: boolean;
}

export interface PresetTriple {
  resolution: Resolution;
  layout: Layout;
  fps: FrameRate;
}

export interface Catalog {
  resolutions: Readonly<
    Record<Resolution, { label: string; width: number; height: number }>
  >;
  layouts: Readonly<
    Record<Layout, { label: string; ratio: readonly [number, number] }>
  >;
  frameRates: readonly FrameRate[];
  fitModes: Readonly<Record<FitMode, { label: string }>>;
  transitions: Readonly<Record<TransitionKind, { label: string }>>;
  effects: Readonly<Record<EffectKind, { label: string }>>;
  colorFilters: Readonly<Record<ColorFilterKind, { label: string }>>;
  subtitlePositions: Readonly<Record<SubtitlePosition, { label: string }>>;
  outputQualities: Readonly<
    Record<OutputQuality, { label: string; videoBitrate: string }>
  >;
  platformPresets: Readonly<
    Record<PlatformPresetName, PresetTriple & { label: string }>
  >;
  ranges: Readonly<Record<NumericField, NumericRange>>;
  defaults: VideoTaskConfig;
  maxScriptLength: number;
  videoExtensions: readonly string[];
  imageExtensions: readonly string[];
}

export function isResolution(value: unknown): value is Resolution {
  return RESOLUTIONS.some(r => r === value);
}

export function isLayout(value: unknown): value is Layout {
  return LAYOUTS.some(l => l === value);
}

export function isFrameRate(value: unknown): value is FrameRate {
  return FRAME_RATES.some(f => f === value);
}

export function isPlatformPresetName(
  value: unknown
): value is PlatformPresetName {
  return PLATFORM_PRESET_NAMES.some(p => p === value);
}

/**
 * Recursively freezes a value so the catalog and validated configs
 * can be shared between concurrent renders.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

const DEFAULTS: VideoTaskConfig = {
  resolution: "1080p",
  layout: "9:16",
  fps: 30,
  platformPreset: null,
  fitMode: "crop",
  clipMinDuration: 3,
  clipMaxDuration: 10,
  transitionEnabled: true,
  transitionType: "fade",
  transitionDuration: 0.5,
  subtitleEnabled: true,
  subtitleFont: "Heiti-SC-Medium",
  subtitleSize: 48,
  subtitleColor: "#FFFFFF",
  subtitleStrokeColor: "#000000",
  subtitleStrokeWidth: 2,
  subtitlePosition: "bottom",
  subtitleLineSpacing: 1.2,
  effectType: null,
  colorFilter: "none",
  brightness: 1,
  contrast: 1,
  saturation: 1,
  bgmEnabled: false,
  bgmVolume: 0.3,
  bgmFadeIn: 0,
  bgmFadeOut: 0,
  outputQuality: "high",
};

/**
 * Checks that every default lies inside its declared range and that each
 * platform preset expands to a triple the catalog itself accepts.
 * Returns the list of problems; an empty list means the catalog is sound.
 */
export function validateCatalogDefaults(catalog: Catalog): string[] {
  const problems: string[] = [];
  const { defaults } = catalog;

  for (const field of NUMERIC_FIELDS) {
    const range = catalog.ranges[field];
    const value = defaults[field];
    if (value < range.min || value > range.max) {
      problems.push(
        `default ${field}=${value} outside [${range.min}, ${range.max}]`
      );
    }
    if (range.integer && !Number.isInteger(value)) {
      problems.push(`default ${field}=${value} is not an integer`);
    }
  }

  if (defaults.clipMinDuration > defaults.clipMaxDuration) {
    problems.push("default clipMinDuration exceeds clipMaxDuration");
  }
  if (!(defaults.resolution in catalog.resolutions)) {
    problems.push(`default resolution ${defaults.resolution} unknown`);
  }
  if (!(defaults.layout in catalog.layouts)) {
    problems.push(`default layout ${defaults.layout} unknown`);
  }
  if (!catalog.frameRates.includes(defaults.fps)) {
    problems.push(`default fps ${defaults.fps} unknown`);
  }

  for (const [name, preset] of Object.entries(catalog.platformPresets)) {
    if (
      !(preset.resolution in catalog.resolutions) ||
      !(preset.layout in catalog.layouts) ||
      !catalog.frameRates.includes(preset.fps)
    ) {
      problems.push(`platform preset ${name} expands outside the catalog`);
    }
  }

  return problems;
}

/**
 * Builds the process-wide catalog. The result is deeply frozen; a catalog
 * whose defaults or presets are inconsistent is rejected at startup.
 */
export function createCatalog(): Catalog {
  const catalog: Catalog = {
    resolutions: {
      "480p": { label: "480p SD", width: 854, height: 480 },
      "720p": { label: "720p HD", width: 1280, height: 720 },
      "1080p": { label: "1080p Full HD", width: 1920, height: 1080 },
      "2k": { label: "2K QHD", width: 2560, height: 1440 },
      "4k": { label: "4K UHD", width: 3840, height: 2160 },
    },
    layouts: {
      "9:16": { label: "Portrait 9:16", ratio: [9, 16] },
      "3:4": { label: "Portrait 3:4", ratio: [3, 4] },
      "1:1": { label: "Square 1:1", ratio: [1, 1] },
      "4:3": { label: "Landscape 4:3", ratio: [4, 3] },
      "16:9": { label: "Landscape 16:9", ratio: [16, 9] },
      "21:9": { label: "Cinema 21:9", ratio: [21, 9] },
    },
    frameRates: [...FRAME_RATES],
    fitModes: {
      crop: { label: "Crop to fill" },
      fit: { label: "Fit with padding" },
      stretch: { label: "Stretch" },
    },
    transitions: {
      none: { label: "None" },
      fade: { label: "Fade" },
      slide_left: { label: "Slide left" },
      slide_right: { label: "Slide right" },
      slide_up: { label: "Slide up" },
      slide_down: { label: "Slide down" },
      zoom_in: { label: "Zoom in" },
      zoom_out: { label: "Zoom out" },
      dissolve: { label: "Dissolve" },
      wipe_left: { label: "Wipe left" },
      wipe_right: { label: "Wipe right" },
    },
    effects: {
      none: { label: "None" },
      ken_burns_in: { label: "Ken Burns in" },
      ken_burns_out: { label: "Ken Burns out" },
      zoom_in: { label: "Zoom in" },
      zoom_out: { label: "Zoom out" },
      pan_left: { label: "Pan left" },
      pan_right: { label: "Pan right" },
      pan_up: { label: "Pan up" },
      pan_down: { label: "Pan down" },
      shake: { label: "Shake" },
    },
    colorFilters: {
      none: { label: "None" },
      grayscale: { label: "Grayscale" },
      vintage: { label: "Vintage" },
      warm: { label: "Warm" },
      cool: { label: "Cool" },
      high_contrast: { label: "High contrast" },
      soft: { label: "Soft" },
    },
    subtitlePositions: {
      top: { label: "Top" },
      center: { label: "Center" },
      bottom: { label: "Bottom" },
      top_left: { label: "Top left" },
      top_right: { label: "Top right" },
      left: { label: "Left" },
      right: { label: "Right" },
      bottom_left: { label: "Bottom left" },
      bottom_right: { label: "Bottom right" },
    },
    outputQualities: {
      low: { label: "Low", videoBitrate: "2000k" },
      medium: { label: "Medium", videoBitrate: "5000k" },
      high: { label: "High", videoBitrate: "8000k" },
      ultra: { label: "Ultra", videoBitrate: "15000k" },
    },
    platformPresets: {
      douyin: { label: "Douyin", resolution: "1080p", layout: "9:16", fps: 30 },
      kuaishou: { label: "Kuaishou", resolution: "1080p", layout: "9:16", fps: 30 },
      xiaohongshu: { label: "Xiaohongshu", resolution: "1080p", layout: "3:4", fps: 30 },
      bilibili: { label: "Bilibili", resolution: "1080p", layout: "16:9", fps: 30 },
      youtube: { label: "YouTube", resolution: "1080p", layout: "16:9", fps: 30 },
      instagram_reels: { label: "Instagram Reels", resolution: "1080p", layout: "9:16", fps: 30 },
      instagram_feed: { label: "Instagram Feed", resolution: "1080p", layout: "1:1", fps: 30 },
      weixin: { label: "WeChat Channels", resolution: "1080p", layout: "9:16", fps: 30 },
    },
    ranges: {
      clipMinDuration: { min: 1, max: 30 },
      clipMaxDuration: { min: 1, max: 60 },
      transitionDuration: { min: 0.3, max: 2.0 },
      subtitleSize: { min: 12, max: 120, integer: true },
      subtitleStrokeWidth: { min: 0, max: 10 },
      subtitleLineSpacing: { min: 0.8, max: 3.0 },
      brightness: { min: 0.5, max: 2.0 },
      contrast: { min: 0.5, max: 2.0 },
      saturation: { min: 0, max: 2.0 },
      bgmVolume: { min: 0, max: 1 },
      bgmFadeIn: { min: 0, max: 5 },
      bgmFadeOut: { min: 0, max: 5 },
    },
    defaults: { ...DEFAULTS },
    maxScriptLength: 5000,
    videoExtensions: [".mp4", ".mov", ".avi", ".mkv", ".webm"],
    imageExtensions: [".jpg", ".jpeg", ".png", ".webp"],
  };

  const problems = validateCatalogDefaults(catalog);
  if (problems.length > 0) {
    throw new Error(`Invalid configuration catalog: ${problems.join("; ")}`);
  }

  return deepFreeze(catalog);
}

export const defaultCatalog: Catalog = createCatalog();
