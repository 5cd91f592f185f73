// backend/services/video-composition/config-validator.ts
import AjvModule from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import {
  COLOR_FILTER_KINDS,
  EFFECT_KINDS,
  FIT_MODES,
  FRAME_RATES,
  LAYOUTS,
  NUMERIC_FIELDS,
  OUTPUT_QUALITIES,
  PLATFORM_PRESET_NAMES,
  RESOLUTIONS,
  SUBTITLE_POSITIONS,
  TRANSITION_KINDS,
  deepFreeze,
  defaultCatalog,
  type Catalog,
} from "./catalog.js";
import { InvalidConfigError, type ConfigViolation } from "./errors.js";
import { applyPreset } from "./platform-presets.js";
import type { ValidatedConfig, VideoTaskConfig } from "./types.js";

const Ajv = AjvModule.default;

export type ValidationResult =
  | { ok: true; config: ValidatedConfig }
  | { ok: false; violations: ConfigViolation[] };

const HEX_COLOR = "^#[0-9A-Fa-f]{6}$";
const FONT_MAX_LENGTH = 128;
const TRANSITION_FIELDS = ["transitionType", "transitionDuration"] as const;
const CLIP_ORDER_VIOLATION: ConfigViolation = {
  field: "clipMinDuration",
  reason: "must not exceed clipMaxDuration",
};

const ENUM_FIELDS: Record<string, readonly (string | number | null)[]> = {
  resolution: RESOLUTIONS,
  layout: LAYOUTS,
  fps: FRAME_RATES,
  platformPreset: [...PLATFORM_PRESET_NAMES, null],
  fitMode: FIT_MODES,
  transitionType: TRANSITION_KINDS,
  subtitlePosition: SUBTITLE_POSITIONS,
  effectType: [...EFFECT_KINDS, null],
  colorFilter: COLOR_FILTER_KINDS,
  outputQuality: OUTPUT_QUALITIES,
};

/**
 * Builds the JSON schema for a task configuration from the catalog, so the
 * accepted values and the advertised options never drift apart.
 */
export function buildConfigSchema(catalog: Catalog = defaultCatalog) {
  const properties: Record<string, Record<string, unknown>> = {};
  const { defaults } = catalog;

  for (const [field, allowed] of Object.entries(ENUM_FIELDS)) {
    properties[field] = { enum: [...allowed] };
  }
  for (const field of NUMERIC_FIELDS) {
    const range = catalog.ranges[field];
    properties[field] = {
      type: range.integer ? "integer" : "number",
      minimum: range.min,
      maximum: range.max,
    };
  }
  for (const field of ["transitionEnabled", "subtitleEnabled", "bgmEnabled"]) {
    properties[field] = { type: "boolean" };
  }
  properties.subtitleFont = {
    type: "string",
    minLength: 1,
    maxLength: FONT_MAX_LENGTH,
  };
  properties.subtitleColor = { type: "string", pattern: HEX_COLOR };
  properties.subtitleStrokeColor = { type: "string", pattern: HEX_COLOR };

  for (const [field, value] of Object.entries(defaults)) {
    const property = properties[field];
    if (property) {
      property.default = value;
    }
  }

  return {
    type: "object",
    additionalProperties: false,
    properties,
  };
}

const validators = new WeakMap<Catalog, ValidateFunction<VideoTaskConfig>>();

function validatorFor(catalog: Catalog): ValidateFunction<VideoTaskConfig> {
  let validate = validators.get(catalog);
  if (!validate) {
    const ajv = new Ajv({ allErrors: true, strict: false, useDefaults: true });
    validate = ajv.compile<VideoTaskConfig>(buildConfigSchema(catalog));
    validators.set(catalog, validate);
  }
  return validate;
}

function fieldOf(error: ErrorObject): string {
  if (error.keyword === "additionalProperties") {
    const extra = error.params.additionalProperty;
    return typeof extra === "string" ? extra : "config";
  }
  const field = error.instancePath.split("/").filter(Boolean)[0];
  return field ?? "config";
}

function formatAllowed(value: string | number | null): string {
  return value === null ? "null" : String(value);
}

function reasonFor(
  error: ErrorObject,
  field: string,
  catalog: Catalog
): string {
  switch (error.keyword) {
    case "additionalProperties":
      return "unknown field";
    case "enum": {
      const allowed = ENUM_FIELDS[field] ?? [];
      return `must be one of: ${allowed.map(formatAllowed).join(", ")}`;
    }
    case "type":
      return error.instancePath === ""
        ? "must be an object"
        : `must be ${String(error.params.type)}`;
    case "minimum":
    case "maximum": {
      const range = NUMERIC_FIELDS.find(f => f === field);
      if (range) {
        const { min, max } = catalog.ranges[range];
        return `must be between ${min} and ${max}`;
      }
      return error.message ?? "out of range";
    }
    case "pattern":
      return "must be a #RRGGBB hex color";
    case "minLength":
    case "maxLength":
      return `must be 1-${FONT_MAX_LENGTH} characters`;
    default:
      return error.message ?? "is invalid";
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates a raw configuration against the catalog.
 *
 * Every violation is reported, one per field. Absent fields take their
 * catalog default. When transitions are disabled the transition fields are
 * ignored and reset to defaults. A named platform preset overwrites
 * resolution, layout and fps.
 */
export function validateConfig(
  raw: unknown,
  catalog: Catalog = defaultCatalog
): ValidationResult {
  let candidate: Record<string, unknown> = {};
  if (isPlainObject(raw)) {
    candidate = { ...raw };
  } else if (raw !== undefined && raw !== null) {
    return {
      ok: false,
      violations: [{ field: "config", reason: "must be an object" }],
    };
  }

  if (candidate.transitionEnabled === false) {
    for (const field of TRANSITION_FIELDS) {
      delete candidate[field];
    }
  }

  const validate = validatorFor(catalog);

  if (validate(candidate)) {
    if (candidate.clipMinDuration > candidate.clipMaxDuration) {
      return { ok: false, violations: [CLIP_ORDER_VIOLATION] };
    }
    return {
      ok: true,
      config: deepFreeze(applyPreset({ ...candidate }, catalog)),
    };
  }

  const violations: ConfigViolation[] = [];
  const seen = new Set<string>();
  for (const error of validate.errors ?? []) {
    const field = fieldOf(error);
    if (seen.has(field)) {
      continue;
    }
    seen.add(field);
    violations.push({ field, reason: reasonFor(error, field, catalog) });
  }

  const min = candidate.clipMinDuration;
  const max = candidate.clipMaxDuration;
  if (
    typeof min === "number" &&
    typeof max === "number" &&
    min > max &&
    !seen.has("clipMinDuration") &&
    !seen.has("clipMaxDuration")
  ) {
    violations.push(CLIP_ORDER_VIOLATION);
  }

  return { ok: false, violations };
}

/** Like validateConfig, but throws InvalidConfigError listing every problem. */
export function parseConfig(
  raw: unknown,
  catalog: Catalog = defaultCatalog
): ValidatedConfig {
  const result = validateConfig(raw, catalog);
  if (!result.ok) {
    throw new InvalidConfigError(result.violations);
  }
  return result.config;
}

/** Fully populated defaults, with the overrides validated on top. */
export function configWithDefaults(
  overrides: Partial<VideoTaskConfig> = {},
  catalog: Catalog = defaultCatalog
): ValidatedConfig {
  return parseConfig({ ...overrides }, catalog);
}
