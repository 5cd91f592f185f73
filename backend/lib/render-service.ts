import { defaultCatalog, type Catalog } from "../services/video-composition/catalog.js";
import { CompositionPipeline } from "../services/video-composition/pipeline.js";
import type { ValidatedConfig } from "../services/video-composition/types.js";
import { loadServiceConfig } from "./config.js";
import { FFmpegRuntime, type MediaRunner } from "./ffmpeg-runtime.js";
import { LoggingWrapper } from "./logging.js";
import { MetricsWrapper } from "./metrics.js";
import { RenderQueue } from "./orchestration.js";
import { TaskStore } from "./task-store.js";
import type { NarrationProvider, RenderInput, RenderTaskSnapshot } from "./types.js";

export interface RenderServiceOptions {
  runner?: MediaRunner;
  narration?: NarrationProvider;
  catalog?: Catalog;
  concurrency?: number;
  /** Write task records to storage; on unless a test turns it off. */
  persist?: boolean;
}

/**
 * Accepts render tasks and runs them in the background. The HTTP handlers
 * talk to one instance per process.
 */
export class RenderService {
  readonly catalog: Catalog;
  readonly store: TaskStore;
  readonly queue: RenderQueue;
  private readonly pipeline: CompositionPipeline;
  private readonly logger = new LoggingWrapper("render-service");

  constructor(options: RenderServiceOptions = {}) {
    const config = loadServiceConfig();
    const metrics = new MetricsWrapper("RenderService");
    this.catalog = options.catalog ?? defaultCatalog;
    this.store = new TaskStore(config.env, {
      persist: options.persist,
      logger: this.logger,
    });
    this.queue = new RenderQueue(options.concurrency ?? config.renderConcurrency);
    this.pipeline = new CompositionPipeline({
      runner:
        options.runner ??
        new FFmpegRuntime(new LoggingWrapper("ffmpeg-runtime"), metrics),
      narration: options.narration,
      catalog: this.catalog,
      metrics,
    });
  }

  /** Records the task as pending and queues it; returns without waiting. */
  submit(config: ValidatedConfig, input: RenderInput): RenderTaskSnapshot {
    const task = this.store.create(config, input);
    const taskId = task.taskId;
    this.logger.info("Render task accepted", { taskId });
    this.queue.submit(taskId, async () => {
      await this.pipeline.render(this.store.handle(taskId));
    });
    return task;
  }

  getTask(taskId: string): RenderTaskSnapshot | undefined {
    return this.store.get(taskId);
  }
}

let instance: RenderService | undefined;

export function getRenderService(): RenderService {
  instance ??= new RenderService();
  return instance;
}

/** Replaces the process-wide service, e.g. with one using a fake runner. */
export function setRenderService(service: RenderService | undefined) {
  instance = service;
}
