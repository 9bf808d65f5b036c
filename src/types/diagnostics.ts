export type Severity = "ERROR" | "WARN" | "INFO";

export type RuleName =
  | "SCHEMA_INVALID"
  | "SCHEMA_MISSING_FIELD"
  | "SCHEMA_TYPE"
  | "SCHEMA_STEP_KEY"
  | "DUP_STEP_ID"
  | "UNKNOWN_ACTOR"
  | "UNKNOWN_ACTION"
  | "DANGLING_REF"
  | "DEPENDENCY_CYCLE"
  | "UNREACHABLE_STEP"
  | "NONEXHAUSTIVE_BRANCH"
  | "DUPLICATE_GUARD"
  | "UNUSED_OUTPUT"
  | "FORMAT"
  | "ADJACENT_KEYS"
  | "PRECISION_LOSS"
  | "NOT_FOUND"
  | "DUPLICATE_KEY"
  | "AMBIGUOUS_RENUMBER"
  | "ORCHESTRATION";

export interface DiagnosticLocation {
  step_id?: string;
  branch?: number;
  guard?: number;
  op?: number;
  path?: string;
}

export interface Diagnostic {
  readonly severity: Severity;
  /** Wire code, `APF` followed by four digits */
  readonly code: string;
  readonly rule: RuleName;
  readonly message: string;
  readonly location?: DiagnosticLocation;
}
