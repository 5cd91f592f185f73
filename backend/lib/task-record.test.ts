import { describe, it, beforeEach, afterEach } from "node:test";
import { strict as assert } from "node:assert";
import fs from "node:fs";
import { configWithDefaults } from "../services/video-composition/config-validator.js";
import { pathFor } from "./storage.js";
import {
  loadTaskRecord,
  saveTaskRecord,
  taskRecordKey,
  TaskRecordNotFoundError,
} from "./task-record.js";
import { useTempStorage } from "./test-utils.js";
import type { RenderTask } from "./types.js";

const TASK_ID = "3b241101-e2bb-4255-8caf-4136c566a962";

function sampleTask(overrides: Partial<RenderTask> = {}): RenderTask {
  const now = new Date().toISOString();
  return {
    schemaVersion: "1.0.0",
    env: "test",
    taskId: TASK_ID,
    status: "pending",
    progress: 0,
    progressMessage: "Queued",
    warnings: [],
    config: configWithDefaults({ layout: "16:9" }),
    input: {
      script: "Hello there. Welcome to the show!",
      media: [{ path: "/uploads/intro.mp4" }],
    },
    createdAt: now,
    updatedAt: now,
    ...overrides,
  };
}

describe("task records", () => {
  let storage: ReturnType<typeof useTempStorage>;

  beforeEach(() => {
    storage = useTempStorage("task-record");
  });

  afterEach(() => {
    storage.restore();
  });

  it("stores records under env/tasks/<taskId>/task.json", () => {
    assert.equal(taskRecordKey("test", TASK_ID), `test/tasks/${TASK_ID}/task.json`);
    const written = saveTaskRecord(sampleTask());
    assert.equal(written, pathFor(`test/tasks/${TASK_ID}/task.json`));
    assert.ok(fs.existsSync(written));
  });

  it("round-trips a record through disk", () => {
    saveTaskRecord(sampleTask({ status: "completed", progress: 100, outputDuration: 12.5 }));
    const loaded = loadTaskRecord("test", TASK_ID);
    assert.equal(loaded.status, "completed");
    assert.equal(loaded.progress, 100);
    assert.equal(loaded.outputDuration, 12.5);
    assert.equal(loaded.config.layout, "16:9");
    assert.deepEqual(loaded.input.media, [{ path: "/uploads/intro.mp4" }]);
  });

  it("refuses to save an invalid record", () => {
    assert.throws(
      () => saveTaskRecord(sampleTask({ progress: 140 })),
      /Invalid task record: data\/progress must be <= 100/
    );
    assert.throws(() => saveTaskRecord(sampleTask({ taskId: "not-a-uuid" })), /Invalid task record/);
  });

  it("raises TaskRecordNotFoundError for unknown tasks", () => {
    assert.throws(() => loadTaskRecord("test", TASK_ID), TaskRecordNotFoundError);
  });

  it("rejects a record that was edited into an invalid state", () => {
    const file = saveTaskRecord(sampleTask());
    const record = JSON.parse(fs.readFileSync(file, "utf-8"));
    record.status = "exploded";
    fs.writeFileSync(file, JSON.stringify(record));
    assert.throws(() => loadTaskRecord("test", TASK_ID), /Invalid task record/);
  });

  it("tolerates a byte order mark", () => {
    const file = saveTaskRecord(sampleTask());
    fs.writeFileSync(file, "\uFEFF" + fs.readFileSync(file, "utf-8"));
    assert.equal(loadTaskRecord("test", TASK_ID).taskId, TASK_ID);
  });

  it("explains unparseable files", () => {
    const file = saveTaskRecord(sampleTask());
    fs.writeFileSync(file, "{ broken");
    assert.throws(() => loadTaskRecord("test", TASK_ID), /Failed to parse JSON/);
  });
});
