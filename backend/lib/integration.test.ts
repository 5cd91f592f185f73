import { describe, it, beforeEach, afterEach } from "node:test";
import { strict as assert } from "node:assert";
import fs from "node:fs";
import { clearIdempotencyCache, createTask } from "./api/tasks/createTask.js";
import { downloadTask } from "./api/tasks/downloadTask.js";
import { getTaskStatus } from "./api/tasks/getTaskStatus.js";
import { RenderService } from "./render-service.js";
import { FakeMediaRunner, touch, useTempStorage, videoProbe } from "./test-utils.js";

describe("Integration: create, render, poll and download", () => {
  let storage: ReturnType<typeof useTempStorage>;

  beforeEach(() => {
    storage = useTempStorage("integration");
    clearIdempotencyCache();
  });

  afterEach(() => {
    storage.restore();
  });

  function newService() {
    // 8s of narration; the last clip keeps the 3s minimum, so the composite runs 9s
    const runner = new FakeMediaRunner(filePath =>
      filePath.includes("/output/") ? videoProbe(1080, 1920, 9) : undefined
    );
    const service = new RenderService({
      runner,
      narration: {
        synthesize: async () => ({
          audioPath: touch(storage.root, "narration/voice.mp3"),
          duration: 8,
          words: [
            { text: "Morning", start: 0, end: 0.8 },
            { text: "run", start: 0.9, end: 1.4 },
            { text: "Coffee", start: 4, end: 4.6 },
            { text: "next", start: 4.7, end: 5.2 },
          ],
        }),
      },
    });
    return { runner, service };
  }

  it("takes a task from creation to a downloadable video", async () => {
    const { runner, service } = newService();
    const clip = touch(storage.root, "uploads/run.mp4");
    const photo = touch(storage.root, "uploads/cup.png");

    const created = await createTask(
      {
        headers: { "x-correlation-id": "it-1" },
        body: JSON.stringify({
          config: { platformPreset: "douyin", fitMode: "fit", effectType: "ken_burns_in" },
          script: "Morning run. Coffee next.",
          media: [
            { path: clip, kind: "video", duration: 12, width: 1920, height: 1080 },
            { path: photo, width: 1200, height: 1600 },
          ],
        }),
      },
      service
    );
    assert.equal(created.statusCode, 201);
    const { taskId } = JSON.parse(created.body);

    await service.queue.onIdle();

    const status = await getTaskStatus({ pathParameters: { taskId } }, service);
    assert.equal(status.statusCode, 200);
    const body = JSON.parse(status.body);
    assert.equal(body.status, "completed");
    assert.equal(body.progress, 100);
    assert.equal(body.duration, 9);
    assert.equal(body.downloadUrl, `/video/tasks/${taskId}/download`);

    assert.deepEqual(runner.operations(), ["SegmentRender", "SegmentRender", "Compose", "Encode"]);

    const download = await downloadTask({ pathParameters: { taskId } }, service);
    assert.equal(download.statusCode, 200);
    assert.ok(download.filePath && fs.existsSync(download.filePath));
  });

  it("serves the status of a task rendered by an earlier process", async () => {
    const first = newService();
    touch(storage.root, "uploads/only.jpg");
    const created = await createTask(
      {
        body: JSON.stringify({
          script: "Just one line.",
          media: [{ path: `${storage.root}/uploads/only.jpg`, width: 640, height: 640 }],
        }),
      },
      first.service
    );
    const { taskId } = JSON.parse(created.body);
    await first.service.queue.onIdle();

    const restarted = newService();
    const status = await getTaskStatus({ pathParameters: { taskId } }, restarted.service);
    assert.equal(status.statusCode, 200);
    assert.equal(JSON.parse(status.body).status, "completed");
  });

  it("records a failed render with its reason", async () => {
    const { runner, service } = newService();
    runner.failOn = "Compose";
    const created = await createTask(
      {
        body: JSON.stringify({
          script: "Two clips. Joined badly.",
          media: [
            { path: touch(storage.root, "uploads/a.jpg"), width: 100, height: 100 },
            { path: touch(storage.root, "uploads/b.jpg"), width: 100, height: 100 },
          ],
        }),
      },
      service
    );
    const { taskId } = JSON.parse(created.body);
    await service.queue.onIdle();

    const body = JSON.parse((await getTaskStatus({ pathParameters: { taskId } }, service)).body);
    assert.equal(body.status, "failed");
    assert.equal(body.errorMessage, "Video generation failed while joining clips");
    assert.equal(body.downloadUrl, undefined);

    const download = await downloadTask({ pathParameters: { taskId } }, service);
    assert.equal(download.statusCode, 409);
  });
});
