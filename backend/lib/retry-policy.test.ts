import { describe, it, beforeEach } from "node:test";
import { strict as assert } from "node:assert";
import { EncodingError } from "../services/video-composition/errors.js";
import { CommandFailedError } from "./ffmpeg-runtime.js";
import { LoggingWrapper, type LogAttributes } from "./logging.js";
import { RetryPolicy, RetryConfigs } from "./retry-policy.js";

class FlaggedError extends Error {
  constructor(
    message: string,
    readonly isRetryable: boolean
  ) {
    super(message);
  }
}

const retryable = (message: string) => new FlaggedError(message, true);
const permanent = (message: string) => new FlaggedError(message, false);

class RecordingLogger extends LoggingWrapper {
  readonly warnings: Array<{ message: string; attributes: LogAttributes }> = [];

  constructor() {
    super("retry-test");
  }

  warn(message: string, attributes: LogAttributes = {}) {
    this.warnings.push({ message, attributes });
  }
}

describe("RetryPolicy", () => {
  let retryPolicy: RetryPolicy;

  beforeEach(() => {
    retryPolicy = new RetryPolicy({ baseDelayMs: 1, jitterMs: 0 });
  });

  describe("execute", () => {
    it("should succeed on first attempt", async () => {
      const result = await retryPolicy.execute(async () => "success");
      assert.equal(result, "success");
    });

    it("should retry on retryable errors", async () => {
      let attempts = 0;
      const result = await retryPolicy.execute(async () => {
        attempts++;
        if (attempts < 3) {
          throw retryable("Temporary failure");
        }
        return "success";
      });

      assert.equal(result, "success");
      assert.equal(attempts, 3);
    });

    it("should not retry on non-retryable errors", async () => {
      let attempts = 0;
      await assert.rejects(
        retryPolicy.execute(async () => {
          attempts++;
          throw permanent("Permanent failure");
        }),
        { message: "Permanent failure" }
      );
      assert.equal(attempts, 1);
    });

    it("should respect max attempts", async () => {
      const policy = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 1, jitterMs: 0 });
      let attempts = 0;
      await assert.rejects(
        policy.execute(async () => {
          attempts++;
          throw retryable("Always fails");
        }),
        { message: "Always fails" }
      );
      assert.equal(attempts, 2);
    });

    it("should use exponential backoff", async () => {
      const policy = new RetryPolicy({
        maxAttempts: 3,
        baseDelayMs: 20,
        backoffMultiplier: 2,
        jitterMs: 0,
      });
      const startTime = Date.now();
      let attempts = 0;

      await assert.rejects(
        policy.execute(async () => {
          attempts++;
          throw retryable("Always fails");
        })
      );
      const elapsed = Date.now() - startTime;
      // 20ms + 40ms between the three attempts
      assert.ok(elapsed >= 55, `Expected at least 55ms, got ${elapsed}ms`);
      assert.equal(attempts, 3);
    });
  });

  describe("isRetryableError", () => {
    it("honours an explicit flag over the message", () => {
      assert.equal(retryPolicy.isRetryableError(permanent("timeout")), false);
      assert.equal(retryPolicy.isRetryableError(retryable("bad input")), true);
    });

    it("falls back to transient message patterns", () => {
      assert.equal(retryPolicy.isRetryableError(new Error("socket ECONNRESET")), true);
      assert.equal(retryPolicy.isRetryableError(new Error("Request timed out")), true);
      assert.equal(retryPolicy.isRetryableError(new Error("file is corrupt")), false);
      assert.equal(retryPolicy.isRetryableError("timeout"), false);
    });

    it("treats composition errors as final", () => {
      assert.equal(retryPolicy.isRetryableError(new EncodingError("connection lost")), false);
    });

    it("retries only timed-out commands", () => {
      assert.equal(
        retryPolicy.isRetryableError(new CommandFailedError("ffprobe timed out", null, "", true)),
        true
      );
      assert.equal(
        retryPolicy.isRetryableError(new CommandFailedError("ffprobe exited with code 1", 1, "")),
        false
      );
    });
  });

  describe("RetryConfigs", () => {
    it("should have valid configurations", () => {
      assert.ok(RetryConfigs.narration.maxAttempts > 0);
      assert.ok(RetryConfigs.probe.maxAttempts > 0);
      assert.ok(RetryConfigs.probe.maxDelayMs <= RetryConfigs.narration.maxDelayMs);
    });
  });

  describe("logging", () => {
    it("reports each retry through the logger", async () => {
      const logger = new RecordingLogger();
      const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 1, jitterMs: 0 }, logger);
      let attempts = 0;
      await policy.execute(async () => {
        attempts++;
        if (attempts < 3) {
          throw retryable("Temporary failure");
        }
        return "ok";
      }, "narration synthesis");

      assert.equal(logger.warnings.length, 2);
      assert.equal(
        logger.warnings[0].message,
        "Retry attempt 1/3 failed for narration synthesis: Temporary failure. Retrying in 1ms"
      );
      assert.deepEqual(logger.warnings[1].attributes, {
        attempt: 2,
        delayMs: 2,
        context: "narration synthesis",
      });
    });
  });
});
