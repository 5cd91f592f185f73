import { describe, it, beforeEach, afterEach } from "node:test";
import { strict as assert } from "node:assert";
import { FakeMediaRunner, touch, useTempStorage, videoProbe } from "../../lib/test-utils.js";
import { MediaAdapterError, MediaNotFoundError } from "./errors.js";
import { acquireMedia, mediaInfoFromProbe, mediaKindForPath, probeMedia } from "./media-probe.js";

describe("mediaKindForPath", () => {
  it("classifies by extension, ignoring case", () => {
    assert.equal(mediaKindForPath("/m/A.MP4"), "video");
    assert.equal(mediaKindForPath("/m/a.webp"), "image");
    assert.equal(mediaKindForPath("/m/notes.txt"), null);
  });
});

describe("mediaInfoFromProbe", () => {
  it("reads size, duration and frame rate of a video", () => {
    assert.deepEqual(mediaInfoFromProbe("/m/a.mp4", "video", videoProbe(1280, 720, 12, { fps: 25 })), {
      path: "/m/a.mp4",
      kind: "video",
      duration: 12,
      width: 1280,
      height: 720,
      fps: 25,
    });
  });

  it("keeps only the size of an image", () => {
    assert.deepEqual(mediaInfoFromProbe("/m/b.png", "image", videoProbe(800, 600, 0, { audio: false })), {
      path: "/m/b.png",
      kind: "image",
      width: 800,
      height: 600,
    });
  });

  it("rejects probes without a video stream or duration", () => {
    assert.throws(
      () => mediaInfoFromProbe("/m/a.mp4", "video", { duration: 3, streams: [] }),
      { message: "Cannot adapt /m/a.mp4: no video stream" }
    );
    assert.throws(
      () => mediaInfoFromProbe("/m/a.mp4", "video", videoProbe(1280, 720, 0)),
      { message: "Cannot adapt /m/a.mp4: missing duration" }
    );
  });
});

describe("probeMedia", () => {
  let storage: ReturnType<typeof useTempStorage>;

  beforeEach(() => {
    storage = useTempStorage("media-probe");
  });

  afterEach(() => {
    storage.restore();
  });

  it("trusts complete caller metadata without probing", async () => {
    const file = touch(storage.root, "a.mp4");
    const runner = new FakeMediaRunner();
    const asset = await probeMedia(runner, { path: file, duration: 8, width: 640, height: 360 });
    assert.deepEqual(asset, { path: file, kind: "video", duration: 8, width: 640, height: 360 });
    assert.deepEqual(runner.probed, []);
  });

  it("probes when metadata is missing", async () => {
    const file = touch(storage.root, "a.mov");
    const runner = new FakeMediaRunner(() => videoProbe(1920, 1080, 5));
    const asset = await probeMedia(runner, { path: file });
    assert.equal(asset.duration, 5);
    assert.equal(asset.width, 1920);
    assert.deepEqual(runner.probed, [file]);
  });

  it("falls back to the declared kind for an unknown extension", async () => {
    const file = touch(storage.root, "upload.bin");
    const runner = new FakeMediaRunner();
    const asset = await probeMedia(runner, { path: file, kind: "image", width: 10, height: 20 });
    assert.equal(asset.kind, "image");
  });

  it("reports unsupported, missing and unreadable files", async () => {
    const runner = new FakeMediaRunner();
    await assert.rejects(probeMedia(runner, { path: "/m/notes.txt" }), {
      message: "Cannot adapt /m/notes.txt: unsupported file type .txt",
    });
    await assert.rejects(probeMedia(runner, { path: `${storage.root}/gone.mp4` }), MediaNotFoundError);

    const broken = touch(storage.root, "broken.mp4");
    await assert.rejects(probeMedia(runner, { path: broken }), (error: unknown) => {
      assert.ok(error instanceof MediaAdapterError);
      assert.equal(
        error.message,
        `Cannot adapt ${broken}: probe failed: Invalid data found when processing input ${broken}`
      );
      return true;
    });
  });
});

describe("acquireMedia", () => {
  let storage: ReturnType<typeof useTempStorage>;

  beforeEach(() => {
    storage = useTempStorage("acquire-media");
  });

  afterEach(() => {
    storage.restore();
  });

  it("skips unusable assets with a warning and keeps upload order", async () => {
    const first = touch(storage.root, "first.jpg");
    const second = touch(storage.root, "second.mp4");
    const missing = `${storage.root}/missing.mp4`;
    const runner = new FakeMediaRunner(() => videoProbe(1280, 720, 6));

    const acquired = await acquireMedia(runner, [
      { path: first, width: 100, height: 100 },
      { path: missing },
      { path: "/m/notes.txt" },
      { path: second },
    ]);

    assert.deepEqual(acquired.assets.map(a => a.path), [first, second]);
    assert.deepEqual(acquired.warnings, [
      `Skipped missing media file ${missing}`,
      "Skipped unusable media file /m/notes.txt: unsupported file type .txt",
    ]);
  });
});
