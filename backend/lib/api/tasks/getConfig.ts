import { LoggingWrapper } from "../../logging.js";
import { getRenderService, type RenderService } from "../../render-service.js";
import { json, type ApiResponse } from "../http.js";

/** Everything a client needs to build the options form. */
export async function getConfig(
  service: RenderService = getRenderService()
): Promise<ApiResponse> {
  const logger = new LoggingWrapper("getConfig");
  const { catalog } = service;
  logger.debug("Serving configuration catalog");
  return json(200, catalog);
}

export const handler = getConfig;
