import type { Diagnostic } from "./diagnostics.js";
import type { Flow, KeyChange, NewStep, StepId } from "./flow.js";
import type { FlowError } from "../errors.js";

export type EditableField =
  | "step_id"
  | "actor"
  | "action"
  | "inputs"
  | "outputs"
  | "notes"
  | "dependencies"
  | "goto"
  | "calls"
  | "meta";

export type EditOperation =
  | { op: "insert_after"; target: StepId; step: NewStep }
  | { op: "insert_before"; target: StepId; step: NewStep }
  | { op: "delete"; target: StepId; cascade?: boolean }
  | { op: "move"; target: StepId; anchor: StepId; position?: "before" | "after" }
  | { op: "update_field"; target: StepId; field: EditableField; value: unknown }
  | { op: "renumber_all"; precision: number; stride?: number };

export type EditScript = EditOperation[];

export type TransactionState = "open" | "applying" | "committed" | "rolled_back";

export interface Committed {
  status: "committed";
  flow: Flow;
  /** Final validation, WARN and INFO only */
  diagnostics: Diagnostic[];
  changes: KeyChange[];
  inserted: StepId[];
}

export interface RolledBack {
  status: "rolled_back";
  /** First hard error */
  error: FlowError;
  /** Index of the failing operation; absent when commit-time validation failed or the caller aborted */
  failedOp?: number;
  diagnostics: Diagnostic[];
}

export type EditResult = Committed | RolledBack;
