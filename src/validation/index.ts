import type { Diagnostic } from "../types/diagnostics.js";
import type { Flow } from "../types/flow.js";
import type { StepKeyOptions } from "../stepkey/index.js";
import { errorsOf } from "../diagnostics/index.js";
import { SchemaError, ValidationError } from "../errors.js";
import { checkSchema } from "./schema.js";
import { semanticChecks, type Registries } from "./semantic.js";

export type { Registries } from "./semantic.js";
export { isDefaultGuard } from "./semantic.js";
export { checkSchema, flowSchema, stepIdSchema } from "./schema.js";

/**
 * Two-phase validation of a loaded document. A schema failure yields a
 * single SCHEMA_* diagnostic and skips the semantic phase. Pure.
 */
export function validateDocument(doc: unknown, registries: Registries, opts: StepKeyOptions = {}): Diagnostic[] {
  const schema = checkSchema(doc, opts);
  if (!schema.ok) return [schema.diagnostic];
  return semanticChecks(schema.flow, registries);
}

export function validateFlow(flow: Flow, registries: Registries, opts: StepKeyOptions = {}): Diagnostic[] {
  return validateDocument(flow, registries, opts);
}

/** Throws SchemaError or ValidationError on any ERROR; returns the remaining diagnostics otherwise. */
export function assertValid(doc: unknown, registries: Registries, opts: StepKeyOptions = {}): Diagnostic[] {
  const schema = checkSchema(doc, opts);
  if (!schema.ok) throw new SchemaError(schema.diagnostic);
  const diags = semanticChecks(schema.flow, registries);
  const errors = errorsOf(diags);
  if (errors.length) throw new ValidationError(errors);
  return diags;
}
