import { describe, it } from "node:test";
import { strict as assert } from "node:assert";
import { InvalidConfigError } from "./errors.js";
import {
  assertNonOverlapping,
  splitSentences,
  subtitlesEvenlyDivided,
  subtitlesFromWordTimings,
} from "./subtitle-timing.js";

describe("splitSentences", () => {
  it("keeps closing punctuation and drops line breaks", () => {
    assert.deepEqual(splitSentences("Hello world. 你好！\nNext"), [
      "Hello world.",
      "你好！",
      "Next",
    ]);
  });

  it("returns nothing for blank scripts", () => {
    assert.deepEqual(splitSentences("  \n "), []);
  });
});

describe("subtitlesEvenlyDivided", () => {
  it("spreads sentences in proportion to their length", () => {
    assert.deepEqual(subtitlesEvenlyDivided("Hi. Hello.", 6), [
      { text: "Hi.", start: 0, end: 2 },
      { text: "Hello.", start: 2, end: 6 },
    ]);
  });

  it("returns nothing without text or duration", () => {
    assert.deepEqual(subtitlesEvenlyDivided("", 5), []);
    assert.deepEqual(subtitlesEvenlyDivided("Hi.", 0), []);
  });
});

describe("subtitlesFromWordTimings", () => {
  it("spans each sentence from its first to its last word", () => {
    const words = [
      { text: "Hello", start: 0, end: 0.4 },
      { text: "world", start: 0.5, end: 0.9 },
      { text: "Bye", start: 1.2, end: 1.6 },
    ];
    assert.deepEqual(subtitlesFromWordTimings(words, "Hello world. Bye!"), [
      { text: "Hello world.", start: 0, end: 0.9 },
      { text: "Bye!", start: 1.2, end: 1.6 },
    ]);
  });

  it("drops sentences no word could be matched to", () => {
    const words = [
      { text: "Hello", start: 0, end: 0.5 },
      { text: "Bye", start: 1, end: 1.5 },
    ];
    assert.deepEqual(subtitlesFromWordTimings(words, "Hello. Missing. Bye."), [
      { text: "Hello.", start: 0, end: 0.5 },
      { text: "Bye.", start: 1, end: 1.5 },
    ]);
  });

  it("matches CJK characters one word at a time", () => {
    const words = [
      { text: "你", start: 0, end: 0.3 },
      { text: "好", start: 0.3, end: 0.6 },
    ];
    assert.deepEqual(subtitlesFromWordTimings(words, "你好。"), [
      { text: "你好。", start: 0, end: 0.6 },
    ]);
  });
});

describe("assertNonOverlapping", () => {
  it("accepts touching intervals", () => {
    assertNonOverlapping([
      { text: "a", start: 0, end: 1 },
      { text: "b", start: 1, end: 2 },
    ]);
  });

  it("lists every bad subtitle", () => {
    assert.throws(
      () =>
        assertNonOverlapping([
          { text: "a", start: 0, end: 2 },
          { text: "b", start: 1, end: 3 },
          { text: "c", start: 4, end: 4 },
          { text: "d", start: -1, end: 5 },
        ]),
      (error: unknown) => {
        assert.ok(error instanceof InvalidConfigError);
        assert.deepEqual(error.violations, [
          { field: "subtitles[1]", reason: "overlaps the previous subtitle" },
          { field: "subtitles[2]", reason: "end must be after start" },
          { field: "subtitles[3]", reason: "invalid timestamps" },
        ]);
        return true;
      }
    );
  });
});
