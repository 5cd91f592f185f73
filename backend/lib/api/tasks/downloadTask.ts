import { validate as isUuid } from "uuid";
import { LoggingWrapper } from "../../logging.js";
import { getRenderService, type RenderService } from "../../render-service.js";
import { existsAtKey, pathFor } from "../../storage.js";
import { header, json, type ApiEvent, type ApiResponse } from "../http.js";

export async function downloadTask(
  event: ApiEvent,
  service: RenderService = getRenderService()
): Promise<ApiResponse> {
  const logger = new LoggingWrapper("downloadTask");
  logger.addPersistentAttributes({
    correlationId: header(event, "x-correlation-id") ?? "unknown",
  });

  try {
    const taskId = event.pathParameters?.taskId;
    if (!taskId || !isUuid(taskId)) {
      return json(400, { error: "Invalid task id" });
    }
    logger.addPersistentAttributes({ taskId });

    const task = service.getTask(taskId);
    if (!task) {
      return json(404, { error: "Task not found" });
    }
    if (task.status !== "completed" || !task.outputKey) {
      return json(409, { error: "Video is not ready", status: task.status });
    }

    const filePath = pathFor(task.outputKey);
    if (!existsAtKey(task.outputKey)) {
      logger.error("Output file missing for completed task", { filePath });
      return json(404, { error: "Video file not found" });
    }

    logger.info("Serving rendered video", { outputKey: task.outputKey });
    return { statusCode: 200, body: "", filePath };
  } catch (error) {
    logger.error("Failed to serve video", {
      error: error instanceof Error ? error.message : String(error),
    });
    return json(500, { error: "Internal server error" });
  }
}

export const handler = downloadTask;
