/** StepKey text as it appears on the wire, e.g. "1.001" */
export type StepId = string;

export interface SubprocessCall {
  subprocess_id: string;
  /** Step the call hands control to, when it names one */
  target?: StepId;
  input_mapping?: Record<string, string>;
  output_mapping?: Record<string, string>;
}

export interface Step {
  step_id: StepId;
  actor: string;
  action: string;
  inputs: string[];
  outputs: string[];
  notes?: string;
  dependencies?: StepId[];
  goto?: StepId[];
  calls?: SubprocessCall[];
  meta?: Record<string, unknown>;
}

export interface Guard {
  label: string;
  to: StepId;
  /** Absent, or one of else/default/otherwise/true, marks the catch-all guard */
  expr?: string;
}

export interface Branch {
  from_step: StepId;
  guards: Guard[];
  merge_to?: StepId;
  /** Labels the guard set is expected to cover */
  cases?: string[];
}

export interface Section {
  major: number;
  title: string;
}

export interface Flow {
  title: string;
  version?: string;
  sections?: Section[];
  steps: Step[];
  branches: Branch[];
  meta?: Record<string, unknown>;
}

export type ReferenceKind = "dependency" | "goto" | "subprocess" | "branch_from" | "guard" | "merge";

export interface StepReference {
  kind: ReferenceKind;
  /** Step holding the reference; for branch references, the branch's from_step */
  source: StepId;
  target: StepId;
  /** e.g. "steps[2].dependencies[0]", "branches[0].guards[1].to" */
  path: string;
}

/** One identity change of a step; `to: null` records a removal. */
export interface KeyChange {
  from: StepId;
  to: StepId | null;
  reason: "delete" | "move" | "rekey" | "renumber";
}

/** Reference Tracker input, keyed by key token; a `null` image means the step was removed. */
export type KeyMapping = Map<string, StepId | null>;

export type NewStep = Omit<Step, "step_id"> & { step_id?: StepId };
