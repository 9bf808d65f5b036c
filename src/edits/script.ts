import { z } from "zod";
import { parse as parseYaml } from "yaml";
import type { EditableField, EditOperation, EditScript } from "../types/edits.js";
import type { Step, StepId } from "../types/flow.js";
import { OrchestrationError } from "../errors.js";
import { callSchema, refSchema, stepBodySchema } from "../validation/schema.js";

const newStepSchema = stepBodySchema.extend({ step_id: z.string().optional() });

const editOperationSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("insert_after"), target: refSchema, step: newStepSchema }),
  z.object({ op: z.literal("insert_before"), target: refSchema, step: newStepSchema }),
  z.object({ op: z.literal("delete"), target: refSchema, cascade: z.boolean().optional() }),
  z.object({
    op: z.literal("move"),
    target: refSchema,
    anchor: refSchema,
    position: z.enum(["before", "after"]).optional()
  }),
  z.object({
    op: z.literal("update_field"),
    target: refSchema,
    field: z.enum(["step_id", "actor", "action", "inputs", "outputs", "notes", "dependencies", "goto", "calls", "meta"]),
    value: z.unknown()
  }),
  z.object({ op: z.literal("renumber_all"), precision: z.number().int().min(0), stride: z.number().int().min(1).optional() })
]);

export const editScriptSchema = z.union([
  z.array(editOperationSchema),
  z.object({ ops: z.array(editOperationSchema) }).transform(s => s.ops)
]);

/** Value shapes accepted by `update_field`. */
export const fieldSchemas = {
  step_id: z.string(),
  actor: z.string().min(1),
  action: z.string().min(1),
  inputs: z.array(z.string()),
  outputs: z.array(z.string()),
  notes: z.string(),
  dependencies: z.array(refSchema),
  goto: z.array(refSchema),
  calls: z.array(callSchema),
  meta: z.record(z.string(), z.unknown())
} satisfies Record<EditableField, z.ZodTypeAny>;

export function parseField<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, field: EditableField, value: unknown, at: StepId): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new OrchestrationError(`invalid value for ${field}: ${parsed.error.issues[0]?.message ?? "rejected"}`, {
      location: { step_id: at }
    });
  }
  return structuredClone(parsed.data);
}

/** Overwrite one non-key field of `step` with a checked copy of `value`. */
export function updateField(step: Step, field: Exclude<EditableField, "step_id">, value: unknown): void {
  const at = step.step_id;
  switch (field) {
    case "actor": step.actor = parseField(fieldSchemas.actor, field, value, at); return;
    case "action": step.action = parseField(fieldSchemas.action, field, value, at); return;
    case "inputs": step.inputs = parseField(fieldSchemas.inputs, field, value, at); return;
    case "outputs": step.outputs = parseField(fieldSchemas.outputs, field, value, at); return;
    case "notes": step.notes = parseField(fieldSchemas.notes, field, value, at); return;
    case "dependencies": step.dependencies = parseField(fieldSchemas.dependencies, field, value, at); return;
    case "goto": step.goto = parseField(fieldSchemas.goto, field, value, at); return;
    case "calls": step.calls = parseField(fieldSchemas.calls, field, value, at); return;
    case "meta": step.meta = parseField(fieldSchemas.meta, field, value, at); return;
  }
}

/** Parse a YAML or JSON edit script: a list of ops, or `{ ops: [...] }`. */
export function parseEditScript(text: string): EditScript {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (e) {
    throw new OrchestrationError(`edit script is not valid YAML/JSON: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  const parsed = editScriptSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new OrchestrationError(`invalid edit script at ${issue.path.join(".") || "root"}: ${issue.message}`);
  }
  return parsed.data.map((o): EditOperation => (o.op === "update_field" ? { ...o, value: o.value } : o));
}
