import Ajv, { type ErrorObject } from "ajv";
import addFormats from "ajv-formats";

export const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

export function formatErrors(errors: ErrorObject[] | null | undefined) {
  if (!errors || errors.length === 0) return "";
  return errors
    .map((err) => `${err.instancePath || "/"} ${err.message ?? "invalid"}`.trim())
    .join("; ");
}
