import type { Diagnostic } from "../types/diagnostics.js";
import type { Branch, Flow, Guard } from "../types/flow.js";
import { diagnostic } from "../diagnostics/index.js";
import { collectReferences, indexSteps, tokenOf } from "../flow/model.js";
import { topoSort } from "../flow/topo.js";

/** Externally owned identifier sets; read, never mutated. */
export interface Registries {
  actors: ReadonlySet<string>;
  actions: ReadonlySet<string>;
}

const DEFAULT_EXPRS = new Set(["", "else", "default", "otherwise", "true"]);

export function isDefaultGuard(g: Guard): boolean {
  return g.expr === undefined || DEFAULT_EXPRS.has(g.expr.trim().toLowerCase());
}

export function checkUniqueness(flow: Flow): Diagnostic[] {
  const groups = new Map<string, string[]>();
  for (const s of flow.steps) {
    const t = tokenOf(s.step_id) ?? s.step_id;
    groups.set(t, [...(groups.get(t) ?? []), s.step_id]);
  }
  const out: Diagnostic[] = [];
  for (const ids of groups.values()) {
    if (ids.length < 2) continue;
    out.push(diagnostic("DUP_STEP_ID", `Duplicate step id ${ids[0]} (${ids.length} steps)`, { step_id: ids[0] }));
  }
  return out;
}

export function checkRegistries(flow: Flow, registries: Registries): Diagnostic[] {
  const out: Diagnostic[] = [];
  for (const s of flow.steps) {
    if (!registries.actors.has(s.actor)) {
      out.push(diagnostic("UNKNOWN_ACTOR", `Unknown actor '${s.actor}'`, { step_id: s.step_id }));
    }
    if (!registries.actions.has(s.action)) {
      out.push(diagnostic("UNKNOWN_ACTION", `Unknown action '${s.action}'`, { step_id: s.step_id }));
    }
  }
  return out;
}

export function checkReferences(flow: Flow): Diagnostic[] {
  const index = indexSteps(flow);
  const out: Diagnostic[] = [];
  for (const ref of collectReferences(flow)) {
    const t = tokenOf(ref.target);
    if (t !== undefined && index.has(t)) continue;
    out.push(diagnostic("DANGLING_REF", `Broken ${ref.kind} reference: ${ref.source} -> ${ref.target}`, {
      step_id: ref.source,
      path: ref.path
    }));
  }
  return out;
}

function checkBranch(branch: Branch, bi: number): Diagnostic[] {
  const out: Diagnostic[] = [];
  const where = { step_id: branch.from_step, branch: bi };

  const counts = new Map<string, number>();
  for (const g of branch.guards) counts.set(g.label, (counts.get(g.label) ?? 0) + 1);
  for (const [label, n] of counts) {
    if (n > 1) out.push(diagnostic("DUPLICATE_GUARD", `Guard label '${label}' appears ${n} times`, where));
  }

  if (branch.guards.some(isDefaultGuard)) return out;
  if (branch.guards.length === 0) {
    out.push(diagnostic("NONEXHAUSTIVE_BRANCH", `Branch at ${branch.from_step} has no guards`, where));
    return out;
  }
  if (!branch.cases?.length) {
    out.push(diagnostic("NONEXHAUSTIVE_BRANCH", `Branch at ${branch.from_step} declares neither cases nor a default guard`, where));
    return out;
  }
  const missing = branch.cases.filter(c => !counts.has(c));
  if (missing.length) {
    out.push(diagnostic("NONEXHAUSTIVE_BRANCH", `Branch at ${branch.from_step} does not cover: ${missing.join(", ")}`, where));
  }
  return out;
}

export function checkBranches(flow: Flow): Diagnostic[] {
  return flow.branches.flatMap((b, i) => checkBranch(b, i));
}

export function checkCycles(flow: Flow): Diagnostic[] {
  const { blocked } = topoSort(flow);
  if (!blocked.length) return [];
  return [diagnostic("DEPENDENCY_CYCLE", `Dependency cycle through ${blocked.join(", ")}`, { step_id: blocked[0] })];
}

/**
 * A step is reached when it opens the flow, is named by a goto, guard, merge
 * or call target, or follows a step that falls through (no goto, not a
 * branch origin). Dependencies order data, not control, and do not count.
 */
export function checkReachability(flow: Flow): Diagnostic[] {
  const targets = new Set<string>();
  const origins = new Set<string>();
  const mark = (set: Set<string>, id: string) => {
    const t = tokenOf(id);
    if (t !== undefined) set.add(t);
  };
  for (const ref of collectReferences(flow)) {
    if (ref.kind === "branch_from") mark(origins, ref.target);
    else if (ref.kind !== "dependency") mark(targets, ref.target);
  }
  const out: Diagnostic[] = [];
  flow.steps.forEach((s, i) => {
    if (i === 0) return;
    const prev = flow.steps[i - 1];
    const prevToken = tokenOf(prev.step_id);
    const fallsThrough = !prev.goto?.length && (prevToken === undefined || !origins.has(prevToken));
    const t = tokenOf(s.step_id);
    if (fallsThrough || (t !== undefined && targets.has(t))) return;
    out.push(diagnostic("UNREACHABLE_STEP", `Unreachable step ${s.step_id}`, { step_id: s.step_id }));
  });
  return out;
}

export function checkUnusedOutputs(flow: Flow): Diagnostic[] {
  const consumers = new Map<string, Set<string>>();
  const consume = (name: string, stepId: string) => {
    const set = consumers.get(name) ?? new Set<string>();
    set.add(stepId);
    consumers.set(name, set);
  };
  for (const s of flow.steps) {
    for (const name of s.inputs) consume(name, s.step_id);
    for (const c of s.calls ?? []) for (const name of Object.keys(c.input_mapping ?? {})) consume(name, s.step_id);
  }
  const out: Diagnostic[] = [];
  for (const s of flow.steps) {
    for (const name of s.outputs) {
      const users = consumers.get(name);
      if (users && [...users].some(id => id !== s.step_id)) continue;
      out.push(diagnostic("UNUSED_OUTPUT", `Output '${name}' of ${s.step_id} is not consumed by any other step`, { step_id: s.step_id }));
    }
  }
  return out;
}

/** All semantic checks; each runs regardless of what the others found. */
export function semanticChecks(flow: Flow, registries: Registries): Diagnostic[] {
  return [
    ...checkUniqueness(flow),
    ...checkRegistries(flow, registries),
    ...checkReferences(flow),
    ...checkBranches(flow),
    ...checkCycles(flow),
    ...checkReachability(flow),
    ...checkUnusedOutputs(flow)
  ];
}
