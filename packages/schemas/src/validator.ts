import AjvModule, { type ErrorObject } from "ajv";
import addFormatsModule from "ajv-formats";
import { WorldDefinitionSchema } from "./world.schema.js";
import { JournalEventSchema } from "./journal-event.schema.js";
import type { WorldDefinition } from "./types.js";

// Both packages are CommonJS; under ESM the default import is module.exports, whose .default is the export.
const ajv = new AjvModule.default({ allErrors: true, strict: false });
addFormatsModule.default(ajv);

const validateWorldDefinition = ajv.compile<WorldDefinition>(WorldDefinitionSchema);
const validateJournalEvent = ajv.compile(JournalEventSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateWorldDefinitionData(data: unknown): ValidationResult {
  const valid = validateWorldDefinition(data);
  return toResult(valid, validateWorldDefinition.errors);
}

export function validateJournalEventData(data: unknown): ValidationResult {
  const valid = validateJournalEvent(data);
  return toResult(valid, validateJournalEvent.errors);
}

export type WorldDefinitionCheck =
  | { valid: true; value: WorldDefinition }
  | { valid: false; errors: string[] };

/** Validate and narrow in one pass. */
export function checkWorldDefinition(data: unknown): WorldDefinitionCheck {
  if (validateWorldDefinition(data)) return { valid: true, value: data };
  return { valid: false, errors: toResult(false, validateWorldDefinition.errors).errors };
}
