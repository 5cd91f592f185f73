import { v4 as uuidv4 } from "uuid";
import { deepFreeze } from "../services/video-composition/catalog.js";
import type { ValidatedConfig } from "../services/video-composition/types.js";
import type { LoggingWrapper } from "./logging.js";
import { loadTaskRecord, saveTaskRecord, TaskRecordNotFoundError } from "./task-record.js";
import type {
  Env,
  RenderInput,
  RenderTask,
  RenderTaskSnapshot,
  TaskStatus,
} from "./types.js";

export type TaskListener = (snapshot: RenderTaskSnapshot) => void;

const TERMINAL: ReadonlySet<TaskStatus> = new Set(["completed", "failed"]);

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL.has(status);
}

/**
 * Holds the latest snapshot of every task. Snapshots are frozen and
 * replaced whole, so a reader never observes a half-applied update.
 */
export class TaskStore {
  private readonly tasks = new Map<string, RenderTaskSnapshot>();
  private readonly listeners = new Set<TaskListener>();

  constructor(
    readonly env: Env,
    private readonly options: { persist?: boolean; logger?: LoggingWrapper } = {}
  ) {}

  create(config: ValidatedConfig, input: RenderInput): RenderTaskSnapshot {
    const now = new Date().toISOString();
    const task: RenderTask = {
      schemaVersion: "1.0.0",
      env: this.env,
      taskId: uuidv4(),
      status: "pending",
      progress: 0,
      progressMessage: "Queued",
      warnings: [],
      config,
      input,
      createdAt: now,
      updatedAt: now,
    };
    return this.publish(task);
  }

  /** Latest snapshot, falling back to the persisted record. */
  get(taskId: string): RenderTaskSnapshot | undefined {
    const cached = this.tasks.get(taskId);
    if (cached || this.options.persist === false) {
      return cached;
    }
    try {
      const loaded = deepFreeze(loadTaskRecord(this.env, taskId));
      this.tasks.set(taskId, loaded);
      return loaded;
    } catch (error) {
      if (error instanceof TaskRecordNotFoundError) {
        return undefined;
      }
      throw error;
    }
  }

  /** A write handle for the worker that owns the task. */
  handle(taskId: string): TaskHandle {
    const snapshot = this.tasks.get(taskId);
    if (!snapshot) {
      throw new Error(`Unknown task ${taskId}`);
    }
    return new TaskHandle(this, snapshot);
  }

  subscribe(listener: TaskListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** @internal used by TaskHandle */
  publish(task: RenderTask): RenderTaskSnapshot {
    const snapshot = deepFreeze(task);
    if (this.options.persist !== false) {
      saveTaskRecord(snapshot);
    }
    this.tasks.set(snapshot.taskId, snapshot);
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        this.options.logger?.warn("Task listener threw", {
          taskId: snapshot.taskId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return snapshot;
  }
}

/**
 * Mutations of one task. Progress never moves backwards and a task in a
 * terminal state ignores further updates.
 */
export class TaskHandle {
  constructor(
    private readonly store: TaskStore,
    private current: RenderTaskSnapshot
  ) {}

  get snapshot(): RenderTaskSnapshot {
    return this.current;
  }

  get taskId(): string {
    return this.current.taskId;
  }

  start(message = "Rendering started"): RenderTaskSnapshot {
    return this.update({ status: "processing", progressMessage: message });
  }

  progress(value: number, message: string): RenderTaskSnapshot {
    return this.update({ progress: value, progressMessage: message });
  }

  warn(message: string): RenderTaskSnapshot {
    return this.update({ warnings: [...this.current.warnings, message] });
  }

  complete(result: { outputKey: string; outputDuration: number }): RenderTaskSnapshot {
    return this.update({
      status: "completed",
      progress: 100,
      progressMessage: "Video ready",
      outputKey: result.outputKey,
      outputDuration: result.outputDuration,
    });
  }

  fail(errorMessage: string): RenderTaskSnapshot {
    // Progress keeps its last value so it stays monotonic
    return this.update({
      status: "failed",
      progressMessage: "Rendering failed",
      errorMessage,
    });
  }

  private update(
    patch: Partial<Pick<RenderTask, "status" | "progress" | "progressMessage" | "errorMessage" | "outputKey" | "outputDuration" | "warnings">>
  ): RenderTaskSnapshot {
    if (isTerminal(this.current.status)) {
      return this.current;
    }
    const requested = patch.progress ?? this.current.progress;
    const progress = Math.min(
      100,
      Math.max(this.current.progress, Math.round(requested))
    );
    this.current = this.store.publish({
      ...this.current,
      ...patch,
      warnings: [...(patch.warnings ?? this.current.warnings)],
      progress,
      updatedAt: new Date().toISOString(),
    });
    return this.current;
  }
}
