// backend/services/video-composition/subtitles.ts
import type { SubtitlePosition } from "./catalog.js";
import type { Size, TimedSubtitle, VideoTaskConfig } from "./types.js";

export const SUBTITLE_MARGIN = 50;
/** Average advance of a non-CJK glyph relative to the font size. */
const LATIN_ADVANCE = 0.55;

export interface SubtitleStyle {
  font: string;
  size: number;
  color: string;
  strokeColor: string;
  strokeWidth: number;
  position: SubtitlePosition;
  lineSpacing: number;
}

type Horizontal = "left" | "center" | "right";
type Vertical = "top" | "middle" | "bottom";

export interface OverlayLine {
  text: string;
  /** Anchor point of the line: its left edge, centre or right edge. */
  x: number;
  /** Vertical centre of the line. */
  y: number;
}

export interface OverlayElement {
  text: string;
  start: number;
  end: number;
  horizontal: Horizontal;
  vertical: Vertical;
  maxWidth: number;
  lines: OverlayLine[];
  style: SubtitleStyle;
}

const ANCHORS: Record<SubtitlePosition, [Horizontal, Vertical]> = {
  top: ["center", "top"],
  center: ["center", "middle"],
  bottom: ["center", "bottom"],
  top_left: ["left", "top"],
  top_right: ["right", "top"],
  left: ["left", "middle"],
  right: ["right", "middle"],
  bottom_left: ["left", "bottom"],
  bottom_right: ["right", "bottom"],
};

export function subtitleStyleFromConfig(config: Readonly<VideoTaskConfig>): SubtitleStyle {
  return {
    font: config.subtitleFont,
    size: config.subtitleSize,
    color: config.subtitleColor,
    strokeColor: config.subtitleStrokeColor,
    strokeWidth: config.subtitleStrokeWidth,
    position: config.subtitlePosition,
    lineSpacing: config.subtitleLineSpacing,
  };
}

const CJK =
  /[\u1100-\u11ff\u2e80-\u9fff\uac00-\ud7af\uf900-\ufaff\ufe30-\ufe4f\uff00-\uffef]/;

export function isWideChar(ch: string): boolean {
  return CJK.test(ch);
}

export function measureText(text: string, fontSize: number): number {
  let width = 0;
  for (const ch of text) {
    width += isWideChar(ch) ? fontSize : fontSize * LATIN_ADVANCE;
  }
  return width;
}

/** Splits text into wrap units: single CJK characters, words and spaces. */
function tokenize(text: string): string[] {
  const tokens: string[] = [];
  let word = "";
  for (const ch of text) {
    if (isWideChar(ch) || /\s/.test(ch)) {
      if (word) {
        tokens.push(word);
        word = "";
      }
      tokens.push(/\s/.test(ch) ? " " : ch);
    } else {
      word += ch;
    }
  }
  if (word) {
    tokens.push(word);
  }
  return tokens;
}

/**
 * Greedy line wrap. CJK text breaks between any two characters, other
 * scripts break between words; a word wider than the line is broken
 * between characters.
 */
export function wrapText(text: string, maxWidth: number, fontSize: number): string[] {
  const lines: string[] = [];
  let current = "";

  const flush = () => {
    const trimmed = current.trim();
    if (trimmed) {
      lines.push(trimmed);
    }
    current = "";
  };

  for (const token of tokenize(text.replace(/\s+/g, " ").trim())) {
    if (measureText(current + token, fontSize) <= maxWidth) {
      current += token;
      continue;
    }
    if (token === " ") {
      flush();
      continue;
    }
    flush();
    if (measureText(token, fontSize) <= maxWidth) {
      current = token;
      continue;
    }
    for (const ch of token) {
      if (current && measureText(current + ch, fontSize) > maxWidth) {
        flush();
      }
      current += ch;
    }
  }
  flush();
  return lines;
}

function anchorX(horizontal: Horizontal, video: Size, margin: number): number {
  switch (horizontal) {
    case "left":
      return margin;
    case "center":
      return video.width / 2;
    case "right":
      return video.width - margin;
  }
}

function lineCentreY(
  vertical: Vertical,
  index: number,
  count: number,
  lineHeight: number,
  video: Size,
  margin: number
): number {
  switch (vertical) {
    case "top":
      return margin + lineHeight * (index + 0.5);
    case "middle":
      return video.height / 2 + lineHeight * (index - (count - 1) / 2);
    case "bottom":
      return video.height - margin - lineHeight * (count - index - 0.5);
  }
}

export interface RenderOptions {
  /** Subtitles are clipped to this duration when given. */
  videoDuration?: number;
  margin?: number;
}

/**
 * Positions timed subtitles on the frame. Each element keeps its
 * subtitle's [start, end) interval, clipped to the video duration;
 * subtitles starting after the video ends are dropped.
 */
export function renderSubtitles(
  videoSize: Size,
  subtitles: readonly TimedSubtitle[],
  style: SubtitleStyle,
  options: RenderOptions = {}
): OverlayElement[] {
  const margin = options.margin ?? SUBTITLE_MARGIN;
  const maxWidth = Math.max(1, videoSize.width - 2 * margin);
  const [horizontal, vertical] = ANCHORS[style.position];
  const lineHeight = style.size * style.lineSpacing;
  const elements: OverlayElement[] = [];

  for (const subtitle of subtitles) {
    const text = subtitle.text.trim();
    if (!text || subtitle.end <= subtitle.start) {
      continue;
    }
    let end = subtitle.end;
    if (options.videoDuration !== undefined) {
      if (subtitle.start >= options.videoDuration) {
        continue;
      }
      end = Math.min(end, options.videoDuration);
    }

    const wrapped = wrapText(text, maxWidth, style.size);
    const x = anchorX(horizontal, videoSize, margin);
    elements.push({
      text,
      start: subtitle.start,
      end,
      horizontal,
      vertical,
      maxWidth,
      style,
      lines: wrapped.map((line, i) => ({
        text: line,
        x,
        y: lineCentreY(vertical, i, wrapped.length, lineHeight, videoSize, margin),
      })),
    });
  }

  return elements;
}

/** "#RRGGBB" to the ASS "&HAABBGGRR" form, fully opaque. */
export function assColor(hex: string): string {
  const m = /^#([0-9A-Fa-f]{2})([0-9A-Fa-f]{2})([0-9A-Fa-f]{2})$/.exec(hex);
  if (!m) {
    return "&H00FFFFFF";
  }
  return `&H00${m[3]}${m[2]}${m[1]}`.toUpperCase();
}

/** Seconds to the ASS "H:MM:SS.cc" timestamp. */
export function assTimestamp(seconds: number): string {
  const totalCs = Math.max(0, Math.round(seconds * 100));
  const h = Math.floor(totalCs / 360000);
  const m = Math.floor((totalCs % 360000) / 6000);
  const s = Math.floor((totalCs % 6000) / 100);
  const cs = totalCs % 100;
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${h}:${pad(m)}:${pad(s)}.${pad(cs)}`;
}

function escapeAssText(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/\{/g, "\\{").replace(/\}/g, "\\}");
}

/** ASS numpad alignment for a line anchored at its vertical centre. */
const MIDDLE_ALIGNMENT: Record<Horizontal, number> = {
  left: 4,
  center: 5,
  right: 6,
};

/**
 * Serialises overlay elements as an ASS script for libass. Every wrapped
 * line becomes its own event pinned with \pos so line spacing is kept.
 */
export function toAssScript(elements: readonly OverlayElement[], videoSize: Size): string {
  const style = elements[0]?.style;
  const styleLine = style
    ? [
        "Default",
        style.font,
        style.size,
        assColor(style.color),
        assColor(style.color),
        assColor(style.strokeColor),
        "&H00000000",
        0, 0, 0, 0,
        100, 100, 0, 0,
        1,
        style.strokeWidth,
        0,
        5,
        SUBTITLE_MARGIN, SUBTITLE_MARGIN, SUBTITLE_MARGIN,
        1,
      ].join(",")
    : "Default,Arial,48,&H00FFFFFF,&H00FFFFFF,&H00000000,&H00000000,0,0,0,0,100,100,0,0,1,2,0,5,50,50,50,1";

  const header = [
    "[Script Info]",
    "ScriptType: v4.00+",
    `PlayResX: ${videoSize.width}`,
    `PlayResY: ${videoSize.height}`,
    "WrapStyle: 2",
    "ScaledBorderAndShadow: yes",
    "",
    "[V4+ Styles]",
    "Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding",
    `Style: ${styleLine}`,
    "",
    "[Events]",
    "Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text",
  ];

  const events: string[] = [];
  for (const element of elements) {
    const an = MIDDLE_ALIGNMENT[element.horizontal];
    for (const line of element.lines) {
      events.push(
        `Dialogue: 0,${assTimestamp(element.start)},${assTimestamp(element.end)},Default,,0,0,0,,` +
          `{\\an${an}\\pos(${Math.round(line.x)},${Math.round(line.y)})}${escapeAssText(line.text)}`
      );
    }
  }

  return [...header, ...events, ""].join("\n");
}
