import path from "node:path";
import { pathToFileURL } from "node:url";
import express, { type Request, type Response } from "express";
import bodyParser from "body-parser";
import { createTask } from "./api/tasks/createTask.js";
import { downloadTask } from "./api/tasks/downloadTask.js";
import { getConfig } from "./api/tasks/getConfig.js";
import { getTaskStatus } from "./api/tasks/getTaskStatus.js";
import type { ApiResponse } from "./api/http.js";
import { loadServiceConfig } from "./config.js";
import { LoggingWrapper } from "./logging.js";
import { FFmpegRuntime } from "./ffmpeg-runtime.js";
import { MetricsWrapper } from "./metrics.js";
import { getRenderService, RenderService, setRenderService } from "./render-service.js";

function correlationId(req: Request) {
  return req.header("x-correlation-id") || `local-${Date.now()}`;
}

function send(res: Response, result: ApiResponse) {
  if (result.filePath) {
    res.status(result.statusCode).type("video/mp4").sendFile(path.resolve(result.filePath));
    return;
  }
  res.status(result.statusCode).type("application/json").send(result.body);
}

export function createApp(service: RenderService = getRenderService()) {
  const app = express();
  const logger = new LoggingWrapper("http");
  app.use(bodyParser.json({ limit: "1mb" }));

  const route =
    (handler: (req: Request) => Promise<ApiResponse>) =>
    (req: Request, res: Response) => {
      handler(req)
        .then(result => send(res, result))
        .catch(error => {
          logger.error("Unhandled route error", {
            path: req.path,
            error: error instanceof Error ? error.message : String(error),
          });
          res.status(500).json({ error: "Internal error" });
        });
    };

  app.get(
    "/video/config",
    route(() => getConfig(service))
  );

  app.post(
    "/video/tasks",
    route(req =>
      createTask(
        {
          headers: {
            "x-correlation-id": correlationId(req),
            "x-idempotency-key": req.header("x-idempotency-key"),
          },
          body: JSON.stringify(req.body ?? {}),
        },
        service
      )
    )
  );

  app.get(
    "/video/tasks/:taskId/status",
    route(req =>
      getTaskStatus(
        {
          headers: { "x-correlation-id": correlationId(req) },
          pathParameters: { taskId: req.params.taskId },
        },
        service
      )
    )
  );

  app.get(
    "/video/tasks/:taskId/download",
    route(req =>
      downloadTask(
        {
          headers: { "x-correlation-id": correlationId(req) },
          pathParameters: { taskId: req.params.taskId },
        },
        service
      )
    )
  );

  return app;
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(path.resolve(entry)).href) {
  const { port } = loadServiceConfig();
  const logger = new LoggingWrapper("http");
  const runtime = new FFmpegRuntime(
    new LoggingWrapper("ffmpeg-runtime"),
    new MetricsWrapper("RenderService")
  );
  const service = new RenderService({ runner: runtime });
  setRenderService(service);

  runtime
    .validateRuntime()
    .then(available => {
      if (!available) {
        logger.warn("ffmpeg is not available; renders will fail until it is installed");
      }
    })
    .catch(error => {
      logger.error("Runtime check failed", {
        error: error instanceof Error ? error.message : String(error),
      });
    });

  createApp(service).listen(port, () => {
    logger.info(`[api] listening on http://localhost:${port}`, { port });
  });
}
