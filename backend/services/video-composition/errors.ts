// backend/services/video-composition/errors.ts

export type CompositionErrorKind =
  | "InvalidConfig"
  | "MediaNotFound"
  | "MediaAdapter"
  | "Transition"
  | "Effect"
  | "NarrationUnavailable"
  | "Encoding";

export interface ConfigViolation {
  field: string;
  reason: string;
}

interface CompositionErrorOptions {
  fatal: boolean;
  userMessage: string;
  cause?: unknown;
}

/**
 * Base for every error the composition engine raises. `fatal` tells the
 * pipeline whether the task must fail or the offending asset can be skipped;
 * `userMessage` is what ends up in the task's error message.
 */
export abstract class CompositionError extends Error {
  abstract readonly kind: CompositionErrorKind;
  readonly fatal: boolean;
  readonly userMessage: string;
  readonly isRetryable: boolean = false;

  protected constructor(message: string, options: CompositionErrorOptions) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.fatal = options.fatal;
    this.userMessage = options.userMessage;
  }
}

export class InvalidConfigError extends CompositionError {
  readonly kind = "InvalidConfig";
  readonly violations: readonly ConfigViolation[];

  constructor(violations: readonly ConfigViolation[]) {
    const summary = violations.map(v => `${v.field}: ${v.reason}`).join("; ");
    super(`Invalid video configuration: ${summary}`, {
      fatal: true,
      userMessage: `Invalid video configuration: ${summary}`,
    });
    this.violations = Object.freeze([...violations]);
  }
}

export class MediaNotFoundError extends CompositionError {
  readonly kind = "MediaNotFound";

  constructor(readonly mediaPath: string) {
    super(`Media asset not found: ${mediaPath}`, {
      fatal: false,
      userMessage: `Skipped missing media file ${mediaPath}`,
    });
  }
}

export class MediaAdapterError extends CompositionError {
  readonly kind = "MediaAdapter";

  constructor(
    reason: string,
    readonly mediaPath?: string,
    cause?: unknown
  ) {
    const subject = mediaPath ?? "media asset";
    super(`Cannot adapt ${subject}: ${reason}`, {
      fatal: false,
      userMessage: `Skipped unusable media file ${subject}: ${reason}`,
      cause,
    });
  }
}

export class TransitionError extends CompositionError {
  readonly kind = "Transition";

  constructor(reason: string) {
    super(`Transition failed: ${reason}`, {
      fatal: true,
      userMessage: "Video generation failed while joining clips",
    });
  }
}

export class EffectError extends CompositionError {
  readonly kind = "Effect";

  constructor(reason: string) {
    super(`Effect failed: ${reason}`, {
      fatal: true,
      userMessage: "Video generation failed while applying visual effects",
    });
  }
}

export class NarrationUnavailableError extends CompositionError {
  readonly kind = "NarrationUnavailable";

  constructor(reason: string, cause?: unknown) {
    super(`Narration unavailable: ${reason}`, {
      fatal: true,
      userMessage: "Narration audio could not be generated",
      cause,
    });
  }
}

export class EncodingError extends CompositionError {
  readonly kind = "Encoding";

  constructor(
    reason: string,
    readonly stderr?: string,
    cause?: unknown
  ) {
    super(`Encoding failed: ${reason}`, {
      fatal: true,
      userMessage: "Video encoding failed",
      cause,
    });
  }
}

export function isCompositionError(error: unknown): error is CompositionError {
  return error instanceof CompositionError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
