import Ajv, { type SchemaObject } from "ajv";
import addFormats from "ajv-formats";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import type { LedgerSnapshot } from "./types";

export type LedgerValidationResult =
  | { ok: true; snapshot: LedgerSnapshot }
  | { ok: false; errors: Array<{ path: string; message: string }> };

function loadSchemaJson(): SchemaObject {
  const here = dirname(fileURLToPath(import.meta.url));
  const content = readFileSync(join(here, "schema.json"), "utf-8");
  const schema: SchemaObject = JSON.parse(content);
  return schema;
}

// Remove $schema field as Ajv doesn't need it for validation
const { $schema, ...schema } = loadSchemaJson();

const ajv = new Ajv({
  allErrors: true,
  strict: false,
  validateSchema: false,
});
addFormats(ajv);

const validateSchema = ajv.compile<LedgerSnapshot>(schema);

export function validateLedger(input: unknown): LedgerValidationResult {
  if (validateSchema(input)) {
    return { ok: true, snapshot: input };
  }

  const errors = (validateSchema.errors ?? []).map((err) => ({
    path: err.instancePath || err.schemaPath || "",
    message: err.message ?? "Validation error",
  }));
  return { ok: false, errors };
}
