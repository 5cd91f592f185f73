// backend/lib/metrics.ts
import { Metrics, MetricUnit } from "@aws-lambda-powertools/metrics";
import { loadServiceConfig } from "./config.js";

type Unit = (typeof MetricUnit)[keyof typeof MetricUnit];

/**
 * Thin wrapper around Powertools Metrics (EMF) with standard dimensions
 */
class MetricsWrapper {
  private metrics: Metrics;

  constructor(serviceName: string, defaultDimensions: Record<string, string> = {}) {
    const config = loadServiceConfig();
    this.metrics = new Metrics({
      namespace: config.metricsNamespace,
      serviceName,
      defaultDimensions: {
        Service: serviceName,
        Environment: config.env,
        ...defaultDimensions,
      },
    });
  }

  /**
   * Add a metric; extra dimensions go out as a single-metric record
   */
  addMetric(
    metricName: string,
    unit: Unit,
    value: number,
    additionalDimensions?: Record<string, string>
  ) {
    if (!additionalDimensions) {
      this.metrics.addMetric(metricName, unit, value);
      return;
    }
    const single = this.metrics.singleMetric();
    for (const [name, dimensionValue] of Object.entries(additionalDimensions)) {
      single.addDimension(name, dimensionValue);
    }
    single.addMetric(metricName, unit, value);
  }

  addCount(metricName: string, additionalDimensions?: Record<string, string>) {
    this.addMetric(metricName, MetricUnit.Count, 1, additionalDimensions);
  }

  addDuration(metricName: string, durationMs: number, additionalDimensions?: Record<string, string>) {
    this.addMetric(metricName, MetricUnit.Milliseconds, durationMs, additionalDimensions);
  }

  addSize(metricName: string, sizeBytes: number, additionalDimensions?: Record<string, string>) {
    this.addMetric(metricName, MetricUnit.Bytes, sizeBytes, additionalDimensions);
  }

  /**
   * Publish all stored metrics
   */
  publishStoredMetrics() {
    this.metrics.publishStoredMetrics();
  }

  /**
   * Record ffmpeg/ffprobe execution time
   */
  recordFFmpegExecution(binary: string, durationMs: number, success: boolean) {
    this.addDuration("FFmpegExecTime", durationMs, {
      Command: binary,
      Success: success.toString(),
    });
  }

  /**
   * Record pipeline stage metrics
   */
  recordOperation(operation: string, success: boolean, durationMs: number) {
    this.addCount(`${operation}${success ? "Success" : "Error"}`);
    this.addDuration(`${operation}Duration`, durationMs);
  }

  recordRenderOutcome(status: "completed" | "failed", outputBytes?: number) {
    this.addCount("RenderTasks", { Outcome: status });
    if (outputBytes !== undefined) {
      this.addSize("OutputSize", outputBytes);
    }
  }
}

export { MetricsWrapper };
