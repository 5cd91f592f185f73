import { v4 as uuidv4 } from "uuid";
import { validateConfig } from "../../../services/video-composition/config-validator.js";
import {
  InvalidConfigError,
  type ConfigViolation,
} from "../../../services/video-composition/errors.js";
import { assertNonOverlapping } from "../../../services/video-composition/subtitle-timing.js";
import type {
  MediaReference,
  TimedSubtitle,
} from "../../../services/video-composition/types.js";
import { LoggingWrapper } from "../../logging.js";
import { getRenderService, type RenderService } from "../../render-service.js";
import { compileSchema, schemaErrorList } from "../../schemas.js";
import type { RenderInput } from "../../types.js";
import { header, json, type ApiEvent, type ApiResponse } from "../http.js";

interface CreateTaskRequest {
  config?: Record<string, unknown>;
  script: string;
  media: MediaReference[];
  narrationAudioPath?: string;
  subtitles?: TimedSubtitle[];
  bgmPath?: string;
  voice?: string;
}

interface CreateTaskResponse {
  taskId: string;
  status: "pending";
}

// In-memory idempotency cache: x-idempotency-key -> created taskId
const idempotencyCache = new Map<string, string>();

export function clearIdempotencyCache() {
  idempotencyCache.clear();
}

function requestViolations(request: CreateTaskRequest, maxScript: number): ConfigViolation[] {
  const violations: ConfigViolation[] = [];
  if (!request.script.trim()) {
    violations.push({ field: "script", reason: "must not be blank" });
  } else if (request.script.length > maxScript) {
    violations.push({ field: "script", reason: `must be at most ${maxScript} characters` });
  }
  if (request.subtitles) {
    try {
      assertNonOverlapping(request.subtitles);
    } catch (error) {
      if (!(error instanceof InvalidConfigError)) {
        throw error;
      }
      violations.push(...error.violations);
    }
  }
  return violations;
}

function configOf(body: unknown): Record<string, unknown> | undefined {
  if (typeof body !== "object" || body === null || !("config" in body)) {
    return {};
  }
  const { config } = body;
  return typeof config === "object" && config !== null && !Array.isArray(config)
    ? { ...config }
    : undefined;
}

export async function createTask(
  event: ApiEvent,
  service: RenderService = getRenderService()
): Promise<ApiResponse> {
  const logger = new LoggingWrapper("createTask");
  const correlationId = header(event, "x-correlation-id") ?? uuidv4();
  const idempotencyKey = header(event, "x-idempotency-key");

  logger.addPersistentAttributes({ correlationId });

  try {
    // Idempotency: return 409 if key is reused
    const existing = idempotencyKey ? idempotencyCache.get(idempotencyKey) : undefined;
    if (existing) {
      logger.warn("Duplicate create detected via idempotency key", {
        idempotencyKey,
      });
      return json(409, { error: "Duplicate create", taskId: existing });
    }

    let body: unknown;
    try {
      body = JSON.parse(event.body || "{}");
    } catch {
      logger.warn("Request body is not valid JSON");
      return json(400, { error: "Request body must be valid JSON" });
    }

    const validateRequest = compileSchema<CreateTaskRequest>(
      "create-task-request.schema.json"
    );
    const request = validateRequest(body) ? body : undefined;
    const violations: ConfigViolation[] = request
      ? requestViolations(request, service.catalog.maxScriptLength)
      : schemaErrorList(validateRequest.errors);

    // A non-object config is already reported by the schema
    const rawConfig = configOf(body);
    const configResult = validateConfig(rawConfig ?? {}, service.catalog);
    if (rawConfig !== undefined && !configResult.ok) {
      violations.push(
        ...configResult.violations.map(v => ({ ...v, field: `config.${v.field}` }))
      );
    }

    if (!request || !configResult.ok || violations.length > 0) {
      logger.warn("Invalid create request", { violations });
      return json(400, { error: "Invalid request", violations });
    }

    const input: RenderInput = {
      script: request.script,
      media: request.media,
      ...(request.narrationAudioPath ? { narrationAudioPath: request.narrationAudioPath } : {}),
      ...(request.subtitles ? { subtitles: request.subtitles } : {}),
      ...(request.bgmPath ? { bgmPath: request.bgmPath } : {}),
      ...(request.voice ? { voice: request.voice } : {}),
    };

    const task = service.submit(configResult.config, input);
    logger.addPersistentAttributes({ taskId: task.taskId, env: task.env });
    logger.info("Task created successfully", {
      status: task.status,
      media: input.media.length,
    });

    // Record idempotency mapping after successful creation
    if (idempotencyKey) {
      idempotencyCache.set(idempotencyKey, task.taskId);
    }

    const response: CreateTaskResponse = { taskId: task.taskId, status: "pending" };
    return json(201, response);
  } catch (error) {
    logger.error("Failed to create task", {
      error: error instanceof Error ? error.message : String(error),
    });
    return json(500, { error: "Internal server error" });
  }
}

export const handler = createTask;
