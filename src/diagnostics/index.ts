import type { Diagnostic, DiagnosticLocation, RuleName, Severity } from "../types/diagnostics.js";

export const DIAGNOSTIC_CODE_PATTERN = /^APF\d{4}$/;

export const RULES: Record<RuleName, { code: string; severity: Severity }> = {
  SCHEMA_INVALID: { code: "APF0001", severity: "ERROR" },
  DUP_STEP_ID: { code: "APF0002", severity: "ERROR" },
  SCHEMA_MISSING_FIELD: { code: "APF0010", severity: "ERROR" },
  SCHEMA_TYPE: { code: "APF0011", severity: "ERROR" },
  SCHEMA_STEP_KEY: { code: "APF0012", severity: "ERROR" },
  UNKNOWN_ACTOR: { code: "APF0100", severity: "ERROR" },
  UNKNOWN_ACTION: { code: "APF0101", severity: "ERROR" },
  DANGLING_REF: { code: "APF0200", severity: "ERROR" },
  DEPENDENCY_CYCLE: { code: "APF0201", severity: "WARN" },
  UNREACHABLE_STEP: { code: "APF0300", severity: "WARN" },
  DUPLICATE_GUARD: { code: "APF0301", severity: "WARN" },
  NONEXHAUSTIVE_BRANCH: { code: "APF0302", severity: "ERROR" },
  UNUSED_OUTPUT: { code: "APF0400", severity: "INFO" },
  FORMAT: { code: "APF0900", severity: "ERROR" },
  ADJACENT_KEYS: { code: "APF0901", severity: "ERROR" },
  PRECISION_LOSS: { code: "APF0902", severity: "ERROR" },
  NOT_FOUND: { code: "APF0903", severity: "ERROR" },
  DUPLICATE_KEY: { code: "APF0904", severity: "ERROR" },
  AMBIGUOUS_RENUMBER: { code: "APF0905", severity: "ERROR" },
  ORCHESTRATION: { code: "APF0906", severity: "ERROR" }
};

export function diagnostic(rule: RuleName, message: string, location?: DiagnosticLocation): Diagnostic {
  const { code, severity } = RULES[rule];
  const d: Diagnostic = location ? { severity, code, rule, message, location } : { severity, code, rule, message };
  return Object.freeze(d);
}

export function hasErrors(diags: readonly Diagnostic[]): boolean {
  return diags.some(d => d.severity === "ERROR");
}

export function errorsOf(diags: readonly Diagnostic[]): Diagnostic[] {
  return diags.filter(d => d.severity === "ERROR");
}

export function countBySeverity(diags: readonly Diagnostic[]): Record<Severity, number> {
  const out: Record<Severity, number> = { ERROR: 0, WARN: 0, INFO: 0 };
  for (const d of diags) out[d.severity] += 1;
  return out;
}

export function formatDiagnostic(d: Diagnostic): string {
  const where = d.location?.step_id ? ` @${d.location.step_id}` : d.location?.path ? ` @${d.location.path}` : "";
  return `${d.severity} ${d.code} ${d.rule}${where}: ${d.message}`;
}
