import type { Branch, Flow, Guard, KeyChange, KeyMapping, StepId } from "../types/flow.js";
import { collectReferences, indexSteps, tokenOf } from "./model.js";

export interface RewriteResult {
  /** References pointed at a new key */
  rewritten: number;
  /** References removed because their target was deleted */
  dropped: number;
  /** Branches removed because their from_step was deleted */
  removedBranches: number;
}

/** Build a tracker mapping (keyed by key token) from recorded key changes. */
export function mappingFromChanges(changes: readonly KeyChange[]): KeyMapping {
  const mapping: KeyMapping = new Map();
  for (const c of changes) {
    const t = tokenOf(c.from);
    if (t !== undefined) mapping.set(t, c.to);
  }
  return mapping;
}

/**
 * Key tokens named by references that resolve to no step. A key change must
 * not hand one of these out, or the broken reference would bind to a step
 * it never meant.
 */
export function danglingTargets(flow: Flow): StepId[] {
  const index = indexSteps(flow);
  const out = new Set<string>();
  for (const ref of collectReferences(flow)) {
    const t = tokenOf(ref.target);
    if (t !== undefined && !index.has(t)) out.add(t);
  }
  return [...out];
}

type Resolved = { kind: "keep" } | { kind: "move"; to: StepId } | { kind: "drop" };

function resolve(mapping: KeyMapping, ref: StepId): Resolved {
  const t = tokenOf(ref);
  if (t === undefined || !mapping.has(t)) return { kind: "keep" };
  const to = mapping.get(t);
  if (to === null || to === undefined) return { kind: "drop" };
  return to === ref ? { kind: "keep" } : { kind: "move", to };
}

/**
 * Rewrite every cross-reference of `flow` through `mapping`, in place.
 * References to keys absent from the mapping are left untouched, including
 * ones that already dangle.
 */
export function rewriteReferences(flow: Flow, mapping: KeyMapping): RewriteResult {
  const result: RewriteResult = { rewritten: 0, dropped: 0, removedBranches: 0 };
  if (mapping.size === 0) return result;

  const rewriteList = (list: StepId[] | undefined): StepId[] | undefined => {
    if (!list) return list;
    const out: StepId[] = [];
    for (const ref of list) {
      const r = resolve(mapping, ref);
      if (r.kind === "drop") { result.dropped++; continue; }
      if (r.kind === "move") { result.rewritten++; out.push(r.to); continue; }
      out.push(ref);
    }
    return out;
  };

  for (const step of flow.steps) {
    if (step.dependencies) step.dependencies = rewriteList(step.dependencies);
    if (step.goto) step.goto = rewriteList(step.goto);
    for (const call of step.calls ?? []) {
      if (call.target === undefined) continue;
      const r = resolve(mapping, call.target);
      if (r.kind === "drop") { delete call.target; result.dropped++; }
      else if (r.kind === "move") { call.target = r.to; result.rewritten++; }
    }
  }

  const branches: Branch[] = [];
  for (const branch of flow.branches) {
    const from = resolve(mapping, branch.from_step);
    if (from.kind === "drop") { result.removedBranches++; continue; }
    if (from.kind === "move") { branch.from_step = from.to; result.rewritten++; }

    const guards: Guard[] = [];
    for (const g of branch.guards) {
      const r = resolve(mapping, g.to);
      if (r.kind === "drop") { result.dropped++; continue; }
      if (r.kind === "move") { g.to = r.to; result.rewritten++; }
      guards.push(g);
    }
    branch.guards = guards;

    if (branch.merge_to !== undefined) {
      const r = resolve(mapping, branch.merge_to);
      if (r.kind === "drop") { delete branch.merge_to; result.dropped++; }
      else if (r.kind === "move") { branch.merge_to = r.to; result.rewritten++; }
    }
    branches.push(branch);
  }
  flow.branches = branches;
  return result;
}
