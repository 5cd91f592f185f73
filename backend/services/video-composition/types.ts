// backend/services/video-composition/types.ts
import type {
  ColorFilterKind,
  EffectKind,
  FitMode,
  FrameRate,
  Layout,
  OutputQuality,
  PlatformPresetName,
  Resolution,
  SubtitlePosition,
  TransitionKind,
} from "./catalog.js";

export interface Size {
  width: number;
  height: number;
}

export interface Rect extends Size {
  x: number;
  y: number;
}

export type ResolvedGeometry = Readonly<Size>;

export interface VideoTaskConfig {
  resolution: Resolution;
  layout: Layout;
  fps: FrameRate;
  platformPreset: PlatformPresetName | null;
  fitMode: FitMode;
  clipMinDuration: number;
  clipMaxDuration: number;
  transitionEnabled: boolean;
  transitionType: TransitionKind;
  transitionDuration: number;
  subtitleEnabled: boolean;
  subtitleFont: string;
  subtitleSize: number;
  subtitleColor: string;
  subtitleStrokeColor: string;
  subtitleStrokeWidth: number;
  subtitlePosition: SubtitlePosition;
  subtitleLineSpacing: number;
  effectType: EffectKind | null;
  colorFilter: ColorFilterKind;
  brightness: number;
  contrast: number;
  saturation: number;
  bgmEnabled: boolean;
  bgmVolume: number;
  bgmFadeIn: number;
  bgmFadeOut: number;
  outputQuality: OutputQuality;
}

/** A validated, frozen configuration. A new config supersedes, never edits. */
export type ValidatedConfig = Readonly<VideoTaskConfig>;

export type MediaKind = "image" | "video";

export interface MediaAsset {
  path: string;
  kind: MediaKind;
  /** Seconds; absent for still images. */
  duration?: number;
  width: number;
  height: number;
  fps?: number;
}

/**
 * What callers hand over for an upload. Anything missing is filled in by
 * probing the file before the render starts.
 */
export interface MediaReference {
  path: string;
  kind?: MediaKind;
  duration?: number;
  width?: number;
  height?: number;
  fps?: number;
}

export interface TimedSubtitle {
  text: string;
  start: number;
  end: number;
}

export interface WordTiming {
  text: string;
  start: number;
  end: number;
}

export interface ProbedStream {
  codecType: "video" | "audio" | "other";
  codecName?: string;
  width?: number;
  height?: number;
  fps?: number;
  duration?: number;
}

export interface ProbeResult {
  formatName?: string;
  duration: number;
  streams: ProbedStream[];
}
