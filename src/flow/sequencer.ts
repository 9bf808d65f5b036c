import type { Flow, KeyChange, NewStep, Step, StepId } from "../types/flow.js";
import { AmbiguousRenumberError, DuplicateKeyError, FormatError, OrchestrationError, PrecisionLossError } from "../errors.js";
import {
  appendAfter, compareStepKeys, formatStepKey, keyToken, makeStepKey, midpoint, parseStepKey, prependBefore,
  type StepKey, type StepKeyOptions
} from "../stepkey/index.js";
import { findStep, keyOf, neighbours, requireStep, sortSteps, tokenOf } from "./model.js";

export interface RenumberOptions extends StepKeyOptions {
  /** Gap between consecutive keys, in units of the last digit: 10 yields 1.010, 1.020, ... */
  stride?: number;
  /** Keys outside the renumbered set; images must not collide with or reorder around them */
  reserved?: readonly StepId[];
}

function lenientKey(id: StepId): StepKey {
  const k = keyOf(id);
  if (!k) throw new FormatError(`malformed step key "${id}"`, { location: { step_id: id } });
  return k;
}

function place(flow: Flow, key: StepKey, newStep: NewStep): StepId {
  const id = formatStepKey(key);
  if (findStep(flow, id)) throw new DuplicateKeyError(`step ${id} already exists`, { location: { step_id: id } });
  const { step_id: _requested, ...body } = newStep;
  const step: Step = { ...body, step_id: id };
  flow.steps.push(step);
  sortSteps(flow);
  return id;
}

/** Insert `newStep` right after `targetId` within its section; returns the assigned key. */
export function insertAfter(flow: Flow, targetId: StepId, newStep: NewStep, opts: StepKeyOptions = {}): StepId {
  const { step, next } = neighbours(flow, targetId);
  const tk = lenientKey(step.step_id);
  const key = next ? midpoint(tk, lenientKey(next.step_id)) : appendAfter(tk, opts);
  return place(flow, key, newStep);
}

/** Insert `newStep` right before `targetId` within its section; returns the assigned key. */
export function insertBefore(flow: Flow, targetId: StepId, newStep: NewStep): StepId {
  const { step, prev } = neighbours(flow, targetId);
  const tk = lenientKey(step.step_id);
  const key = prev ? midpoint(lenientKey(prev.step_id), tk) : prependBefore(tk);
  return place(flow, key, newStep);
}

export function removeStep(flow: Flow, id: StepId): Step {
  const step = requireStep(flow, id);
  flow.steps.splice(flow.steps.indexOf(step), 1);
  return step;
}

/** Re-key `id` next to `anchorId`. The step keeps its content; references are the caller's. */
export function moveStep(
  flow: Flow,
  id: StepId,
  anchorId: StepId,
  position: "before" | "after" = "after",
  opts: StepKeyOptions = {}
): KeyChange {
  const step = requireStep(flow, id);
  requireStep(flow, anchorId);
  if (tokenOf(step.step_id) === tokenOf(anchorId)) {
    throw new OrchestrationError(`cannot move ${id} relative to itself`, { location: { step_id: id } });
  }
  const from = step.step_id;
  removeStep(flow, from);
  const to = position === "after" ? insertAfter(flow, anchorId, step, opts) : insertBefore(flow, anchorId, step);
  return { from, to, reason: "move" };
}

/** Explicit key change for one step. */
export function rekeyStep(flow: Flow, id: StepId, newId: StepId, opts: StepKeyOptions = {}): KeyChange {
  const step = requireStep(flow, id);
  const to = formatStepKey(parseStepKey(newId, opts));
  const clash = findStep(flow, to);
  if (clash && clash !== step) throw new DuplicateKeyError(`step ${to} already exists`, { location: { step_id: to } });
  const from = step.step_id;
  step.step_id = to;
  sortSteps(flow);
  return { from, to, reason: "rekey" };
}

/**
 * Canonical keys for `stepIds`: each section is renumbered `major.stride*n`
 * at `precision`, preserving order. Pure; returns old id -> new id for every
 * supplied id.
 */
export function renumber(stepIds: readonly StepId[], precision: number, opts: RenumberOptions = {}): Map<StepId, StepId> {
  const stride = opts.stride ?? 1;
  if (!Number.isInteger(stride) || stride < 1) throw new FormatError(`stride must be a positive integer, got ${stride}`);
  if (!Number.isInteger(precision) || precision < 0) throw new FormatError(`precision must be a non-negative integer, got ${precision}`);
  if (opts.minPrecision !== undefined && precision < opts.minPrecision) {
    throw new FormatError(`precision ${precision} is below the minimum of ${opts.minPrecision}`);
  }

  const seen = new Map<string, StepId>();
  const keyed = stepIds.map(id => {
    const key = lenientKey(id);
    const prior = seen.get(keyToken(key));
    if (prior !== undefined) {
      throw new AmbiguousRenumberError(`${prior} and ${id} name the same key`, { location: { step_id: id } });
    }
    seen.set(keyToken(key), id);
    return { id, key };
  });

  const bySection = new Map<number, typeof keyed>();
  for (const entry of keyed) {
    const group = bySection.get(entry.key.major) ?? [];
    group.push(entry);
    bySection.set(entry.key.major, group);
  }

  const capacity = 10n ** BigInt(precision);
  const images = new Map<string, StepKey>();
  for (const [major, group] of bySection) {
    group.sort((a, b) => compareStepKeys(a.key, b.key));
    group.forEach((entry, i) => {
      const fraction = BigInt(stride) * BigInt(i + 1);
      if (fraction >= capacity) {
        throw new PrecisionLossError(
          `section ${major} has ${group.length} steps; precision ${precision} with stride ${stride} cannot hold them`
        );
      }
      images.set(entry.id, makeStepKey(major, fraction, precision));
    });
  }

  assertOrderPreserved(keyed, images, opts.reserved ?? [], seen);

  const out = new Map<StepId, StepId>();
  for (const { id } of keyed) {
    const image = images.get(id);
    if (image) out.set(id, formatStepKey(image));
  }
  return out;
}

function assertOrderPreserved(
  keyed: ReadonlyArray<{ id: StepId; key: StepKey }>,
  images: ReadonlyMap<string, StepKey>,
  reserved: readonly StepId[],
  renumbered: ReadonlyMap<string, StepId>
): void {
  const rows: Array<{ id: StepId; before: StepKey; after: StepKey }> = [];
  for (const { id, key } of keyed) {
    const after = images.get(id);
    if (after) rows.push({ id, before: key, after });
  }
  for (const id of reserved) {
    const key = lenientKey(id);
    if (!renumbered.has(keyToken(key))) rows.push({ id, before: key, after: key });
  }
  rows.sort((a, b) => compareStepKeys(a.before, b.before));
  for (let i = 1; i < rows.length; i++) {
    if (compareStepKeys(rows[i - 1].after, rows[i].after) >= 0) {
      throw new AmbiguousRenumberError(
        `renumbering places ${rows[i - 1].id} -> ${formatStepKey(rows[i - 1].after)} at or after ${rows[i].id} -> ${formatStepKey(rows[i].after)}`,
        { location: { step_id: rows[i].id } }
      );
    }
  }
}

/** Re-key steps through an old id -> new id map and restore key order. */
export function applyMapping(flow: Flow, mapping: ReadonlyMap<StepId, StepId>): KeyChange[] {
  const byToken = new Map<string, StepId>();
  for (const [from, to] of mapping) {
    const t = tokenOf(from);
    if (t !== undefined) byToken.set(t, to);
  }
  const changes: KeyChange[] = [];
  for (const step of flow.steps) {
    const t = tokenOf(step.step_id);
    const to = t === undefined ? undefined : byToken.get(t);
    if (to === undefined || to === step.step_id) continue;
    changes.push({ from: step.step_id, to, reason: "renumber" });
    step.step_id = to;
  }
  const owners = new Map<string, StepId>();
  for (const step of flow.steps) {
    const t = tokenOf(step.step_id);
    if (t === undefined) continue;
    if (owners.has(t)) throw new DuplicateKeyError(`step ${step.step_id} already exists`, { location: { step_id: step.step_id } });
    owners.set(t, step.step_id);
  }
  sortSteps(flow);
  return changes;
}
