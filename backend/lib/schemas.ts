import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import AjvModule from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import addFormatsModule from "ajv-formats";

const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

/**
 * Locates a file under docs/schemas, trying the working directory first
 * and then the path relative to this module.
 */
export function findSchemaPath(fileName: string): string {
  const possiblePaths = [
    path.resolve(process.cwd(), "docs/schemas", fileName),
    path.resolve(process.cwd(), "../docs/schemas", fileName),
    path.resolve(__dirname, "../../docs/schemas", fileName),
  ];
  const found = possiblePaths.find(p => fs.existsSync(p));
  if (!found) {
    throw new Error(
      `Schema ${fileName} not found. Tried: ${possiblePaths.join(", ")}`
    );
  }
  return found;
}

export function compileSchema<T>(fileName: string): ValidateFunction<T> {
  if (!ajv.getSchema(fileName)) {
    const schema = JSON.parse(
      fs.readFileSync(findSchemaPath(fileName), "utf-8")
    );
    ajv.addSchema(schema, fileName);
  }
  const validate = ajv.getSchema<T>(fileName);
  if (!validate) {
    throw new Error(`Schema ${fileName} could not be compiled`);
  }
  return validate;
}

export function schemaErrorsText(
  errors: ErrorObject[] | null | undefined
): string {
  return ajv.errorsText(errors ?? []);
}

/** One entry per failing location, e.g. "/media/0/path: must be string". */
export function schemaErrorList(
  errors: ErrorObject[] | null | undefined
): { field: string; reason: string }[] {
  return (errors ?? []).map(error => {
    const missing =
      error.keyword === "required" &&
      typeof error.params.missingProperty === "string"
        ? `/${error.params.missingProperty}`
        : "";
    const extra =
      error.keyword === "additionalProperties" &&
      typeof error.params.additionalProperty === "string"
        ? `/${error.params.additionalProperty}`
        : "";
    const field = `${error.instancePath}${missing}${extra}`.replace(/^\//, "");
    return {
      field: field.replace(/\//g, ".") || "body",
      reason: error.message ?? "is invalid",
    };
  });
}
