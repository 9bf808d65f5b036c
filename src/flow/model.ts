import type { Flow, Step, StepId, StepReference } from "../types/flow.js";
import { NotFoundError, FormatError } from "../errors.js";
import { compareStepKeys, keyToken, parseStepKey, type StepKey } from "../stepkey/index.js";

const TERMINAL_RE = /^(END|EXIT|REJECT)_/;

/** Goto targets such as END_OK or REJECT_INPUT close the flow instead of naming a step. */
export function isTerminal(target: string): boolean {
  return TERMINAL_RE.test(target);
}

/** Parse a stored id leniently (no minimum precision); undefined when it is not a key at all. */
export function keyOf(id: StepId): StepKey | undefined {
  try {
    return parseStepKey(id, { minPrecision: 0 });
  } catch (e) {
    if (e instanceof FormatError) return undefined;
    throw e;
  }
}

export function tokenOf(id: StepId): string | undefined {
  const k = keyOf(id);
  return k ? keyToken(k) : undefined;
}

export function sameKey(a: StepId, b: StepId): boolean {
  const ta = tokenOf(a);
  return ta !== undefined && ta === tokenOf(b);
}

function requireKey(id: StepId): StepKey {
  const k = keyOf(id);
  if (!k) throw new FormatError(`malformed step key "${id}"`, { location: { step_id: id } });
  return k;
}

export function compareIds(a: StepId, b: StepId): number {
  return compareStepKeys(requireKey(a), requireKey(b));
}

export function cloneFlow(flow: Flow): Flow {
  return structuredClone(flow);
}

export function freezeFlow<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) freezeFlow(v);
  }
  return value;
}

/** Orders steps by key in place; equal keys keep document order. */
export function sortSteps(flow: Flow): Flow {
  flow.steps.sort((a, b) => compareIds(a.step_id, b.step_id));
  return flow;
}

export function indexSteps(flow: Flow): Map<string, Step> {
  const index = new Map<string, Step>();
  for (const s of flow.steps) {
    const t = tokenOf(s.step_id);
    if (t !== undefined && !index.has(t)) index.set(t, s);
  }
  return index;
}

export function findStep(flow: Flow, id: StepId): Step | undefined {
  const t = tokenOf(id);
  if (t === undefined) return undefined;
  return flow.steps.find(s => tokenOf(s.step_id) === t);
}

export function requireStep(flow: Flow, id: StepId): Step {
  const step = findStep(flow, id);
  if (!step) throw new NotFoundError(`step ${id} not found`, { location: { step_id: id } });
  return step;
}

export function sectionSteps(flow: Flow, major: number): Step[] {
  return flow.steps
    .filter(s => keyOf(s.step_id)?.major === major)
    .sort((a, b) => compareIds(a.step_id, b.step_id));
}

export function sectionTitle(flow: Flow, major: number): string | undefined {
  return flow.sections?.find(s => s.major === major)?.title;
}

/** Predecessor and successor of `id` inside its own section. */
export function neighbours(flow: Flow, id: StepId): { step: Step; prev?: Step; next?: Step } {
  const step = requireStep(flow, id);
  const siblings = sectionSteps(flow, requireKey(step.step_id).major);
  const i = siblings.indexOf(step);
  return { step, prev: siblings[i - 1], next: siblings[i + 1] };
}

/** Every cross-reference held by the flow, in document order. */
export function collectReferences(flow: Flow): StepReference[] {
  const refs: StepReference[] = [];
  flow.steps.forEach((s, si) => {
    (s.dependencies ?? []).forEach((target, i) =>
      refs.push({ kind: "dependency", source: s.step_id, target, path: `steps[${si}].dependencies[${i}]` }));
    (s.goto ?? []).forEach((target, i) => {
      if (!isTerminal(target)) refs.push({ kind: "goto", source: s.step_id, target, path: `steps[${si}].goto[${i}]` });
    });
    (s.calls ?? []).forEach((c, i) => {
      if (c.target !== undefined) refs.push({ kind: "subprocess", source: s.step_id, target: c.target, path: `steps[${si}].calls[${i}].target` });
    });
  });
  flow.branches.forEach((b, bi) => {
    refs.push({ kind: "branch_from", source: b.from_step, target: b.from_step, path: `branches[${bi}].from_step` });
    b.guards.forEach((g, gi) =>
      refs.push({ kind: "guard", source: b.from_step, target: g.to, path: `branches[${bi}].guards[${gi}].to` }));
    if (b.merge_to !== undefined) {
      refs.push({ kind: "merge", source: b.from_step, target: b.merge_to, path: `branches[${bi}].merge_to` });
    }
  });
  return refs;
}

/** References that point at `id`. */
export function referencesTo(flow: Flow, id: StepId): StepReference[] {
  return collectReferences(flow).filter(r => sameKey(r.target, id));
}
