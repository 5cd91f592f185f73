import { describe, it } from "node:test";
import { strict as assert } from "node:assert";
import { defaultCatalog } from "./catalog.js";
import {
  assColor,
  assTimestamp,
  measureText,
  renderSubtitles,
  subtitleStyleFromConfig,
  toAssScript,
  wrapText,
  type SubtitleStyle,
} from "./subtitles.js";

const FRAME = { width: 1080, height: 1920 };
const style: SubtitleStyle = subtitleStyleFromConfig(defaultCatalog.defaults);

function near(actual: number | undefined, expected: number) {
  assert.ok(actual !== undefined && Math.abs(actual - expected) < 1e-9, `${actual} != ${expected}`);
}

describe("wrapText", () => {
  it("breaks CJK text between any two characters", () => {
    assert.deepEqual(wrapText("你好世界", 100, 48), ["你好", "世界"]);
  });

  it("breaks other scripts between words", () => {
    assert.deepEqual(wrapText("aaa  bbb", 20, 10), ["aaa", "bbb"]);
  });

  it("breaks a word wider than the line between characters", () => {
    assert.deepEqual(wrapText("abcdefgh", 20, 10), ["abc", "def", "gh"]);
  });

  it("measures CJK glyphs wider than Latin ones", () => {
    assert.equal(measureText("你", 40), 40);
    near(measureText("ab", 40), 44);
  });
});

describe("renderSubtitles", () => {
  it("anchors a bottom subtitle above the bottom margin", () => {
    const [element] = renderSubtitles(FRAME, [{ text: "Hello", start: 0, end: 2 }], style);
    assert.equal(element.horizontal, "center");
    assert.equal(element.vertical, "bottom");
    assert.equal(element.maxWidth, 980);
    assert.equal(element.lines.length, 1);
    assert.equal(element.lines[0].x, 540);
    // 1920 - 50 - (48 * 1.2) / 2
    near(element.lines[0].y, 1841.2);
  });

  it("stacks wrapped lines around the centre", () => {
    const centred = { ...style, position: "center" as const };
    const [element] = renderSubtitles({ width: 300, height: 1000 }, [{ text: "你好世界你好", start: 0, end: 1 }], centred);
    // 200px line fits four 48px glyphs
    assert.deepEqual(element.lines.map(l => l.text), ["你好世界", "你好"]);
    near(element.lines[0].y, 500 - 28.8);
    near(element.lines[1].y, 500 + 28.8);
  });

  it("pins corner positions to the margins", () => {
    const [element] = renderSubtitles(FRAME, [{ text: "Hi", start: 0, end: 1 }], {
      ...style,
      position: "top_left",
    });
    assert.equal(element.lines[0].x, 50);
    near(element.lines[0].y, 50 + 28.8);
  });

  it("clips to the video duration and drops late or empty subtitles", () => {
    const elements = renderSubtitles(
      FRAME,
      [
        { text: "one", start: 0, end: 5 },
        { text: "  ", start: 5, end: 6 },
        { text: "late", start: 8, end: 9 },
      ],
      style,
      { videoDuration: 4 }
    );
    assert.equal(elements.length, 1);
    assert.equal(elements[0].end, 4);
  });
});

describe("ASS output", () => {
  it("converts colors and timestamps", () => {
    assert.equal(assColor("#FF8800"), "&H000088FF");
    assert.equal(assColor("red"), "&H00FFFFFF");
    assert.equal(assTimestamp(3723.456), "1:02:03.46");
    assert.equal(assTimestamp(0), "0:00:00.00");
  });

  it("writes one positioned event per line", () => {
    const elements = renderSubtitles(FRAME, [{ text: "Hello {there}", start: 0, end: 4 }], style);
    const lines = toAssScript(elements, FRAME).split("\n");
    assert.ok(lines.includes("PlayResX: 1080"));
    assert.ok(lines.includes("PlayResY: 1920"));
    assert.ok(
      lines.includes(
        "Style: Default,Heiti-SC-Medium,48,&H00FFFFFF,&H00FFFFFF,&H00000000,&H00000000,0,0,0,0,100,100,0,0,1,2,0,5,50,50,50,1"
      )
    );
    assert.equal(
      lines.filter(l => l.startsWith("Dialogue:")).join("\n"),
      "Dialogue: 0,0:00:00.00,0:00:04.00,Default,,0,0,0,,{\\an5\\pos(540,1841)}Hello \\{there\\}"
    );
  });
});
