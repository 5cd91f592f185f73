// backend/lib/logging.ts
import { Logger } from "@aws-lambda-powertools/logger";
import { loadServiceConfig } from "./config.js";

export type LogAttributes = Record<string, unknown>;

/**
 * Thin wrapper around Powertools Logger providing context fields
 */
class LoggingWrapper {
  private logger: Logger;

  constructor(operation: string, persistentAttributes: LogAttributes = {}) {
    const config = loadServiceConfig();
    this.logger = new Logger({
      serviceName: config.serviceName,
      logLevel: config.logLevel,
      persistentLogAttributes: { operation, ...persistentAttributes },
    });
  }

  /**
   * Log info message with optional additional attributes
   */
  info(message: string, attributes: LogAttributes = {}) {
    this.logger.info(message, attributes);
  }

  /**
   * Log error message with optional additional attributes
   */
  error(message: string, attributes: LogAttributes = {}) {
    this.logger.error(message, attributes);
  }

  warn(message: string, attributes: LogAttributes = {}) {
    this.logger.warn(message, attributes);
  }

  debug(message: string, attributes: LogAttributes = {}) {
    this.logger.debug(message, attributes);
  }

  /**
   * Add persistent attributes to all subsequent log messages
   */
  addPersistentAttributes(attributes: LogAttributes) {
    this.logger.addPersistentLogAttributes(attributes);
  }
}

export { LoggingWrapper };
