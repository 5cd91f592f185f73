import { describe, it } from "node:test";
import { strict as assert } from "node:assert";
import { FIT_MODES, LAYOUTS, RESOLUTIONS } from "./catalog.js";
import { MediaAdapterError } from "./errors.js";
import { resolveGeometry } from "./geometry.js";
import { adaptMedia, assertAdaptable, ffmpegColor } from "./media-adapter.js";

const PORTRAIT = { width: 1080, height: 1920 };
const LANDSCAPE_SOURCE = { width: 1280, height: 720 };

describe("adaptMedia", () => {
  it("letterboxes a landscape clip into a portrait frame in fit mode", () => {
    const adapted = adaptMedia(LANDSCAPE_SOURCE, PORTRAIT, "fit");
    assert.deepEqual(adapted.scaled, { width: 1080, height: 608 });
    assert.deepEqual(adapted.content, { x: 0, y: 656, width: 1080, height: 608 });
    assert.deepEqual(adapted.pad, { x: 0, y: 656, color: "0x000000" });
    assert.deepEqual(adapted.filters, [
      "scale=1080:608",
      "pad=1080:1920:0:656:color=0x000000",
      "setsar=1",
    ]);
  });

  it("pillarboxes a portrait clip into a landscape frame in fit mode", () => {
    const adapted = adaptMedia({ width: 720, height: 1280 }, { width: 1920, height: 1080 }, "fit", "#FFFFFF");
    // 720 * 1080 / 1280 = 607.5, rounded to 608
    assert.deepEqual(adapted.content, { x: 656, y: 0, width: 608, height: 1080 });
    assert.equal(adapted.pad?.color, "0xFFFFFF");
  });

  it("scales to cover and crops the centre in crop mode", () => {
    const adapted = adaptMedia(LANDSCAPE_SOURCE, PORTRAIT, "crop");
    assert.deepEqual(adapted.scaled, { width: 3413, height: 1920 });
    assert.deepEqual(adapted.crop, { x: 1166, y: 0, width: 1080, height: 1920 });
    assert.deepEqual(adapted.content, { x: 0, y: 0, width: 1080, height: 1920 });
    assert.deepEqual(adapted.filters, ["scale=3413:1920", "crop=1080:1920:1166:0", "setsar=1"]);
  });

  it("ignores the aspect ratio in stretch mode", () => {
    const adapted = adaptMedia(LANDSCAPE_SOURCE, PORTRAIT, "stretch");
    assert.deepEqual(adapted.scaled, PORTRAIT);
    assert.deepEqual(adapted.filters, ["scale=1080:1920", "setsar=1"]);
  });

  it("passes a source of the target size through unchanged", () => {
    for (const mode of ["crop", "fit", "stretch"] as const) {
      const adapted = adaptMedia(PORTRAIT, PORTRAIT, mode);
      assert.deepEqual(adapted.content, { x: 0, y: 0, ...PORTRAIT }, mode);
    }
  });

  it("fills the target and keeps the source ratio in fit mode for every frame", () => {
    const sources = [
      { width: 1280, height: 720 },
      { width: 720, height: 1280 },
      { width: 1080, height: 1080 },
      { width: 3840, height: 2160 },
      { width: 640, height: 480 },
      { width: 1920, height: 800 },
    ];
    for (const resolution of RESOLUTIONS) {
      for (const layout of LAYOUTS) {
        const target = resolveGeometry(resolution, layout);
        for (const source of sources) {
          for (const mode of FIT_MODES) {
            const label = `${source.width}x${source.height} -> ${target.width}x${target.height} ${mode}`;
            const adapted = adaptMedia(source, target, mode);
            assert.deepEqual(adapted.output, target, label);
            const { content } = adapted;
            assert.ok(content.x >= 0 && content.y >= 0, label);
            assert.ok(content.x + content.width <= target.width, label);
            assert.ok(content.y + content.height <= target.height, label);
            if (mode === "fit") {
              const ratio = source.width / source.height;
              const error = Math.abs(content.width / content.height - ratio) / ratio;
              assert.ok(error < 0.01, `${label} ratio off by ${error}`);
              assert.ok(content.width === target.width || content.height === target.height, label);
            } else {
              assert.deepEqual(content, { x: 0, y: 0, ...target }, label);
            }
          }
        }
      }
    }
  });

  it("rejects zero-sized sources", () => {
    assert.throws(() => adaptMedia({ width: 0, height: 720 }, PORTRAIT, "crop"), MediaAdapterError);
  });
});

describe("assertAdaptable", () => {
  it("accepts images without a duration", () => {
    assertAdaptable({ path: "/m/a.png", kind: "image", width: 10, height: 10 });
  });

  it("rejects videos with no playable duration", () => {
    assert.throws(
      () => assertAdaptable({ path: "/m/a.mp4", kind: "video", width: 10, height: 10, duration: 0 }),
      (error: unknown) => {
        assert.ok(error instanceof MediaAdapterError);
        assert.equal(error.message, "Cannot adapt /m/a.mp4: video has zero duration");
        assert.equal(error.fatal, false);
        return true;
      }
    );
  });

  it("rejects assets with missing dimensions", () => {
    assert.throws(
      () => assertAdaptable({ path: "/m/a.png", kind: "image", width: Number.NaN, height: 10 }),
      MediaAdapterError
    );
  });
});

describe("ffmpegColor", () => {
  it("converts hex colors and leaves names alone", () => {
    assert.equal(ffmpegColor("#1E1E1E"), "0x1E1E1E");
    assert.equal(ffmpegColor("black"), "black");
  });
});
