// backend/services/video-composition/subtitle-timing.ts
import { InvalidConfigError, type ConfigViolation } from "./errors.js";
import type { TimedSubtitle, WordTiming } from "./types.js";

const SENTENCE_BREAK = /([。！？.!?\n]+)/;

/**
 * Splits a script into sentences, keeping each sentence's closing
 * punctuation. Line breaks end a sentence but are not kept.
 */
export function splitSentences(script: string): string[] {
  const parts = script.split(SENTENCE_BREAK);
  const sentences: string[] = [];
  for (let i = 0; i < parts.length; i += 2) {
    const body = parts[i].trim();
    const punct = (parts[i + 1] ?? "").replace(/\n/g, "").trim();
    if (body) {
      sentences.push(body + punct);
    }
  }
  return sentences;
}

function round3(n: number): number {
  return Math.round(n * 1000) / 1000;
}

/**
 * Spreads sentences across a known total duration, each getting time in
 * proportion to its length. Intervals are contiguous and never overlap.
 */
export function subtitlesEvenlyDivided(
  script: string,
  totalDuration: number
): TimedSubtitle[] {
  const sentences = splitSentences(script);
  if (sentences.length === 0 || !(totalDuration > 0)) {
    return [];
  }
  const weights = sentences.map(s => Math.max(1, [...s].length));
  const total = weights.reduce((a, b) => a + b, 0);

  const result: TimedSubtitle[] = [];
  let elapsed = 0;
  sentences.forEach((text, i) => {
    const start = round3((elapsed / total) * totalDuration);
    elapsed += weights[i];
    const end =
      i === sentences.length - 1
        ? round3(totalDuration)
        : round3((elapsed / total) * totalDuration);
    if (end > start) {
      result.push({ text, start, end });
    }
  });
  return result;
}

function normalise(text: string): string {
  return text.replace(/[\s。！？.!?，,、；;：:"'“”‘’]/g, "");
}

/**
 * Aggregates word-level timings from the narration engine into sentence
 * subtitles. Words are matched against the script in order; a sentence
 * spans from its first word's start to its last word's end. Sentences no
 * word could be matched to are dropped.
 */
export function subtitlesFromWordTimings(
  words: readonly WordTiming[],
  script: string
): TimedSubtitle[] {
  const sentences = splitSentences(script);
  if (sentences.length === 0) {
    return [];
  }

  const result: TimedSubtitle[] = [];
  let wordIndex = 0;

  for (const sentence of sentences) {
    let remaining = normalise(sentence);
    let start: number | undefined;
    let end: number | undefined;

    while (wordIndex < words.length && remaining) {
      const word = words[wordIndex];
      const token = normalise(word.text);
      if (!token) {
        wordIndex++;
        continue;
      }
      const at = remaining.indexOf(token);
      if (at === -1) {
        break;
      }
      start ??= word.start;
      end = word.end;
      remaining = remaining.slice(at + token.length);
      wordIndex++;
    }

    if (start !== undefined && end !== undefined && end > start) {
      const previous = result[result.length - 1];
      const clampedStart = previous ? Math.max(start, previous.end) : start;
      if (end > clampedStart) {
        result.push({ text: sentence, start: clampedStart, end });
      }
    }
  }

  return result;
}

/**
 * Rejects subtitle lists that go backwards, have empty intervals or
 * overlap. Producers call this before handing subtitles to the renderer.
 */
export function assertNonOverlapping(subtitles: readonly TimedSubtitle[]): void {
  const violations: ConfigViolation[] = [];
  for (let i = 0; i < subtitles.length; i++) {
    const { start, end } = subtitles[i];
    if (!Number.isFinite(start) || !Number.isFinite(end) || start < 0) {
      violations.push({ field: `subtitles[${i}]`, reason: "invalid timestamps" });
    } else if (end <= start) {
      violations.push({ field: `subtitles[${i}]`, reason: "end must be after start" });
    } else if (i > 0 && start < subtitles[i - 1].end) {
      violations.push({
        field: `subtitles[${i}]`,
        reason: "overlaps the previous subtitle",
      });
    }
  }
  if (violations.length > 0) {
    throw new InvalidConfigError(violations);
  }
}
