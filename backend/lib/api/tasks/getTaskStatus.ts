import { validate as isUuid } from "uuid";
import { loadServiceConfig } from "../../config.js";
import { LoggingWrapper } from "../../logging.js";
import { getRenderService, type RenderService } from "../../render-service.js";
import { describeStorage } from "../../task-record.js";
import type { RenderTaskSnapshot, TaskStatus, TaskStatusResponse } from "../../types.js";
import { header, json, type ApiEvent, type ApiResponse } from "../http.js";

const DEFAULT_MESSAGES: Record<TaskStatus, string> = {
  pending: "Waiting to start",
  processing: "Rendering",
  completed: "Video ready",
  failed: "Video generation failed",
};

export function downloadPath(taskId: string) {
  return `/video/tasks/${taskId}/download`;
}

/**
 * Client-facing view of a task. The download URL is only present once the
 * task completed, the error message only once it failed.
 */
export function buildStatusResponse(
  task: RenderTaskSnapshot,
  publicBaseUrl = ""
): TaskStatusResponse {
  const response: TaskStatusResponse = {
    taskId: task.taskId,
    status: task.status,
    progress: task.progress,
    message: task.progressMessage || DEFAULT_MESSAGES[task.status],
    warnings: [...task.warnings],
  };
  if (task.status === "completed") {
    response.downloadUrl = `${publicBaseUrl}${downloadPath(task.taskId)}`;
    if (task.outputDuration !== undefined) {
      response.duration = task.outputDuration;
    }
  }
  if (task.status === "failed") {
    response.errorMessage = task.errorMessage || DEFAULT_MESSAGES.failed;
  }
  return response;
}

export async function getTaskStatus(
  event: ApiEvent,
  service: RenderService = getRenderService()
): Promise<ApiResponse> {
  const logger = new LoggingWrapper("getTaskStatus");
  const correlationId = header(event, "x-correlation-id") ?? "unknown";

  logger.addPersistentAttributes({ correlationId });

  try {
    const taskId = event.pathParameters?.taskId;
    if (!taskId || !isUuid(taskId)) {
      logger.warn("Invalid taskId in path parameters", { taskId });
      return json(400, { error: "Invalid task id" });
    }

    logger.addPersistentAttributes({ taskId });

    const task = service.getTask(taskId);
    if (!task) {
      logger.warn("Task not found", describeStorage(service.store.env, taskId));
      return json(404, { error: "Task not found" });
    }

    logger.debug("Task status retrieved", {
      status: task.status,
      progress: task.progress,
    });
    return json(200, buildStatusResponse(task, loadServiceConfig().publicBaseUrl));
  } catch (error) {
    logger.error("Failed to get task status", {
      error: error instanceof Error ? error.message : String(error),
    });
    return json(500, { error: "Internal server error" });
  }
}

export const handler = getTaskStatus;
