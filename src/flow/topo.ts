import type { Flow, StepId } from "../types/flow.js";
import { tokenOf } from "./model.js";

export interface TopoResult {
  order: StepId[];
  /** Steps on, or only reachable through, a dependency cycle */
  blocked: StepId[];
}

/** Kahn ordering over resolved `dependencies` edges (dependency -> dependent). */
export function topoSort(flow: Flow): TopoResult {
  const indeg: Record<string, number> = {};
  const adj: Record<string, string[]> = {};
  const idOf: Record<string, StepId> = {};
  for (const s of flow.steps) {
    const t = tokenOf(s.step_id);
    if (t === undefined || t in idOf) continue;
    indeg[t] = 0; adj[t] = []; idOf[t] = s.step_id;
  }
  for (const s of flow.steps) {
    const to = tokenOf(s.step_id);
    if (to === undefined) continue;
    for (const dep of s.dependencies ?? []) {
      const from = tokenOf(dep);
      if (from === undefined || !(from in idOf)) continue;
      indeg[to] += 1;
      adj[from].push(to);
    }
  }
  const q: string[] = Object.keys(indeg).filter(k => indeg[k] === 0);
  const out: string[] = [];
  while (q.length) {
    const u = q.shift();
    if (u === undefined) break;
    out.push(u);
    for (const v of adj[u]) {
      indeg[v] -= 1;
      if (indeg[v] === 0) q.push(v);
    }
  }
  const done = new Set(out);
  return {
    order: out.map(t => idOf[t]),
    blocked: Object.keys(idOf).filter(t => !done.has(t)).map(t => idOf[t])
  };
}
