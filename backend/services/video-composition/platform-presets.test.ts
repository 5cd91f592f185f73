import { describe, it } from "node:test";
import { strict as assert } from "node:assert";
import { defaultCatalog } from "./catalog.js";
import { configWithDefaults } from "./config-validator.js";
import { resolveGeometry } from "./geometry.js";
import { applyPreset, expandPreset, isCatalogTriple } from "./platform-presets.js";

describe("platform presets", () => {
  it("expands known names to their triple", () => {
    assert.deepEqual(expandPreset("douyin"), {
      resolution: "1080p",
      layout: "9:16",
      fps: 30,
    });
    assert.deepEqual(expandPreset("instagram_feed"), {
      resolution: "1080p",
      layout: "1:1",
      fps: 30,
    });
  });

  it("sizes a xiaohongshu task at 1080x1440", () => {
    const config = configWithDefaults({ platformPreset: "xiaohongshu" });
    assert.equal(config.resolution, "1080p");
    assert.equal(config.layout, "3:4");
    assert.equal(config.fps, 30);
    assert.deepEqual(resolveGeometry(config.resolution, config.layout), {
      width: 1080,
      height: 1440,
    });
  });

  it("returns null for unknown or absent names", () => {
    assert.equal(expandPreset("myspace"), null);
    assert.equal(expandPreset(null), null);
    assert.equal(expandPreset(undefined), null);
  });

  it("overwrites resolution, layout and fps when a preset is named", () => {
    const config = {
      ...defaultCatalog.defaults,
      resolution: "4k" as const,
      layout: "21:9" as const,
      fps: 60 as const,
      platformPreset: "bilibili" as const,
    };
    const applied = applyPreset(config);
    assert.equal(applied.resolution, "1080p");
    assert.equal(applied.layout, "16:9");
    assert.equal(applied.fps, 30);
    assert.equal(applied.fitMode, config.fitMode);
  });

  it("leaves the config alone without a preset", () => {
    const config = { ...defaultCatalog.defaults, resolution: "720p" as const };
    assert.equal(applyPreset(config), config);
  });

  it("accepts only triples from the catalog", () => {
    assert.ok(isCatalogTriple({ resolution: "2k", layout: "4:3", fps: 25 }));
    for (const name of Object.keys(defaultCatalog.platformPresets)) {
      const triple = expandPreset(name);
      assert.ok(triple && isCatalogTriple(triple), name);
    }
  });
});
