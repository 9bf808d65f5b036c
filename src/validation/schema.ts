import { z } from "zod";
import type { Diagnostic, RuleName } from "../types/diagnostics.js";
import type { Flow } from "../types/flow.js";
import { diagnostic } from "../diagnostics/index.js";
import { isStepKeyText, type StepKeyOptions } from "../stepkey/index.js";

export function stepIdSchema(opts: StepKeyOptions = {}) {
  return z.string().refine(s => isStepKeyText(s, opts), {
    message: "expected a step key MAJOR(.FRACTION)",
    params: { stepKey: true }
  });
}

export const refSchema = z.string().min(1);

export const callSchema = z.object({
  subprocess_id: z.string().min(1),
  target: refSchema.optional(),
  input_mapping: z.record(z.string(), z.string()).optional(),
  output_mapping: z.record(z.string(), z.string()).optional()
});

const guardSchema = z.object({
  label: z.string().min(1),
  to: refSchema,
  expr: z.string().optional()
});

const branchSchema = z.object({
  from_step: refSchema,
  guards: z.array(guardSchema),
  merge_to: refSchema.optional(),
  cases: z.array(z.string()).optional()
});

const sectionSchema = z.object({
  major: z.number().int().min(1),
  title: z.string()
});

/** Step content without its key; edit scripts supply steps in this shape. */
export const stepBodySchema = z.object({
  actor: z.string().min(1),
  action: z.string().min(1),
  inputs: z.array(z.string()).default([]),
  outputs: z.array(z.string()).default([]),
  notes: z.string().optional(),
  dependencies: z.array(refSchema).optional(),
  goto: z.array(refSchema).optional(),
  calls: z.array(callSchema).optional(),
  meta: z.record(z.string(), z.unknown()).optional()
});

export function flowSchema(opts: StepKeyOptions = {}) {
  const stepSchema = stepBodySchema.extend({ step_id: stepIdSchema(opts) });
  return z.object({
    title: z.string().min(1),
    version: z.string().optional(),
    sections: z.array(sectionSchema).optional(),
    steps: z.array(stepSchema),
    branches: z.array(branchSchema).default([]),
    meta: z.record(z.string(), z.unknown()).optional()
  });
}

export type SchemaCheck = { ok: true; flow: Flow } | { ok: false; diagnostic: Diagnostic };

function formatPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, seg) => (typeof seg === "number" ? `${acc}[${seg}]` : acc ? `${acc}.${seg}` : seg), "");
}

function ruleFor(issue: z.ZodIssue): RuleName {
  if (issue.code === z.ZodIssueCode.invalid_type) {
    return issue.received === "undefined" ? "SCHEMA_MISSING_FIELD" : "SCHEMA_TYPE";
  }
  if (issue.code === z.ZodIssueCode.custom && issue.params?.stepKey === true) return "SCHEMA_STEP_KEY";
  return "SCHEMA_INVALID";
}

/** Structural phase: parse `doc` into a Flow, or report its first problem as one diagnostic. */
export function checkSchema(doc: unknown, opts: StepKeyOptions = {}): SchemaCheck {
  const parsed = flowSchema(opts).safeParse(doc);
  if (parsed.success) return { ok: true, flow: parsed.data };
  const issues = parsed.error.issues;
  const first = issues[0];
  const path = formatPath(first.path);
  const more = issues.length > 1 ? ` (+${issues.length - 1} more schema issue(s))` : "";
  return {
    ok: false,
    diagnostic: diagnostic(ruleFor(first), `${path || "document"}: ${first.message}${more}`, path ? { path } : undefined)
  };
}
