import { z } from "zod";

const flag = (fallback: boolean) =>
  z.string().optional().transform(v => {
    if (v === undefined || v.trim() === "") return fallback;
    return ["1", "true", "yes", "on"].includes(v.trim().toLowerCase());
  });

const envSchema = z.object({
  STEPKEY_MIN_PRECISION: z.coerce.number().int().min(0).default(3),
  RENUMBER_PRECISION: z.coerce.number().int().min(0).default(3),
  RENUMBER_STRIDE: z.coerce.number().int().min(1).default(1),
  VALIDATE_PER_OP: flag(false),
  QUIET: flag(false),
  LOG_EDITS: flag(true)
});

export interface FlowConfig {
  /** Minimum fractional digits accepted by the key parser */
  minPrecision: number;
  renumberPrecision: number;
  renumberStride: number;
  /** Validate after every edit operation, not only before commit */
  validatePerOp: boolean;
  quiet: boolean;
  logEdits: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): FlowConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`invalid configuration: ${issue.path.join(".")}: ${issue.message}`);
  }
  const e = parsed.data;
  return {
    minPrecision: e.STEPKEY_MIN_PRECISION,
    renumberPrecision: e.RENUMBER_PRECISION,
    renumberStride: e.RENUMBER_STRIDE,
    validatePerOp: e.VALIDATE_PER_OP,
    quiet: e.QUIET,
    logEdits: e.LOG_EDITS
  };
}
