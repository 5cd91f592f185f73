import fs from "node:fs";
import { compileSchema, schemaErrorsText } from "./schemas.js";
import {
  ensureDirForFile,
  existsAtKey,
  pathFor,
  readFileAtKey,
  storageRoot,
  taskKey,
} from "./storage.js";
import type { RenderTask } from "./types.js";

const SCHEMA_FILE = "render-task.schema.json";

export function taskRecordKey(env: string, taskId: string) {
  return taskKey(env, taskId, "task.json");
}

export class TaskRecordNotFoundError extends Error {
  constructor(readonly taskId: string, filePath: string) {
    super(`Task record not found at: ${filePath}`);
    this.name = "TaskRecordNotFoundError";
  }
}

function assertValid(value: unknown): RenderTask {
  const validate = compileSchema<RenderTask>(SCHEMA_FILE);
  if (!validate(value)) {
    throw new Error("Invalid task record: " + schemaErrorsText(validate.errors));
  }
  return value;
}

export function loadTaskRecord(env: string, taskId: string): RenderTask {
  const recordKey = taskRecordKey(env, taskId);
  const p = pathFor(recordKey);

  if (!existsAtKey(recordKey)) {
    throw new TaskRecordNotFoundError(taskId, p);
  }

  let content = readFileAtKey(recordKey).toString("utf-8");
  // Strip a BOM left by editors
  if (content.charCodeAt(0) === 0xfeff) {
    content = content.slice(1);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content.trim());
  } catch (error) {
    const preview = content.slice(0, 50).replace(/\r?\n/g, "\\n");
    throw new Error(
      `Failed to parse JSON from ${p}: ${error instanceof Error ? error.message : String(error)}\nFile preview (first 50 bytes): ${preview}`
    );
  }
  return assertValid(parsed);
}

export function saveTaskRecord(task: RenderTask): string {
  // Round-trip through JSON so undefined optionals are dropped before validation
  const plain: unknown = JSON.parse(JSON.stringify(task));
  assertValid(plain);
  const p = pathFor(taskRecordKey(task.env, task.taskId));
  ensureDirForFile(p);
  const tmp = `${p}.tmp`;
  fs.writeFileSync(tmp, JSON.stringify(plain, null, 2));
  fs.renameSync(tmp, p);
  return p;
}

export function describeStorage(env: string, taskId: string) {
  return {
    storageRoot: storageRoot(),
    recordKey: taskRecordKey(env, taskId),
    MEDIA_STORAGE_PATH: process.env.MEDIA_STORAGE_PATH || "(not set)",
  };
}
