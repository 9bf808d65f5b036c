import type { Diagnostic } from "../types/diagnostics.js";
import type { Committed, EditOperation, EditResult, EditScript, RolledBack, TransactionState } from "../types/edits.js";
import type { Flow, KeyChange, Step, StepId } from "../types/flow.js";
import type { Registries } from "../validation/index.js";
import { diagnostic, errorsOf, hasErrors } from "../diagnostics/index.js";
import { FlowError, NotFoundError, OrchestrationError, SchemaError, ValidationError, toFlowError } from "../errors.js";
import { cloneFlow, findStep, freezeFlow, tokenOf } from "../flow/model.js";
import { danglingTargets, mappingFromChanges, rewriteReferences } from "../flow/references.js";
import { applyMapping, insertAfter, insertBefore, moveStep, rekeyStep, removeStep, renumber } from "../flow/sequencer.js";
import { validateFlow } from "../validation/index.js";
import { COLOR, createLogger, fmtMs, type FlowLogger } from "../log.js";
import { fieldSchemas, parseField, updateField } from "./script.js";

export interface EngineOptions {
  registries: Registries;
  minPrecision?: number;
  /** Run the validator after each operation and fail on ERROR */
  validatePerOp?: boolean;
  logger?: FlowLogger;
}

interface SessionHooks {
  commit(tx: Transaction, flow: Flow): Flow;
  release(tx: Transaction): void;
}

function describe(op: EditOperation): string {
  switch (op.op) {
    case "renumber_all": return `renumber_all p=${op.precision}${op.stride ? ` stride=${op.stride}` : ""}`;
    case "move": return `move ${op.target} ${op.position ?? "after"} ${op.anchor}`;
    case "update_field": return `update_field ${op.target}.${op.field}`;
    default: return `${op.op} ${op.target}`;
  }
}

/**
 * One edit transaction over a working copy: open -> applying -> committed | rolled_back.
 * Any failing operation rolls the transaction back before the error is rethrown.
 */
export class Transaction {
  private stateValue: TransactionState = "open";
  private readonly working: Flow;
  private readonly changes: KeyChange[] = [];
  private readonly inserted: StepId[] = [];
  private readonly removed = new Set<string>();
  private readonly renamed = new Map<string, StepId>();
  private lastValidation: Diagnostic[] = [];
  private opCount = 0;
  private outcome?: EditResult;
  private readonly log: FlowLogger;

  constructor(base: Flow, private readonly options: EngineOptions, private readonly hooks: SessionHooks) {
    this.working = cloneFlow(base);
    this.log = options.logger ?? createLogger();
  }

  get state(): TransactionState {
    return this.stateValue;
  }

  /** Settled result, once committed or rolled back. */
  get result(): EditResult | undefined {
    return this.outcome;
  }

  apply(op: EditOperation): this {
    if (this.stateValue !== "open" && this.stateValue !== "applying") {
      throw new OrchestrationError(`transaction is ${this.stateValue}`);
    }
    this.stateValue = "applying";
    const index = this.opCount++;
    const t0 = Date.now();
    if (this.log.edits) this.log.line(`${COLOR.cyan("▶ op")} ${index + 1} ${describe(op)}`);
    try {
      const dangling = danglingTargets(this.working);
      const held = this.heldTokens();
      this.applyOp(op, dangling);
      this.assertNoCapture(dangling, held);
      if (this.options.validatePerOp) this.validateOrThrow();
    } catch (err) {
      const error = toFlowError(err);
      this.rollBack(error, index);
      throw error;
    }
    if (this.log.edits) this.log.line(COLOR.gray(`  applied (${fmtMs(Date.now() - t0)})`));
    return this;
  }

  /** Final full validation, then an atomic swap into the session. */
  commit(): EditResult {
    if (this.stateValue !== "open" && this.stateValue !== "applying") {
      throw new OrchestrationError(`transaction is ${this.stateValue}`);
    }
    try {
      this.validateOrThrow();
    } catch (err) {
      return this.rollBack(toFlowError(err));
    }
    const flow = this.hooks.commit(this, this.working);
    this.stateValue = "committed";
    const result: Committed = {
      status: "committed",
      flow,
      diagnostics: this.lastValidation,
      changes: this.changes.slice(),
      inserted: this.inserted.slice()
    };
    this.outcome = result;
    if (this.log.edits) this.log.line(`${COLOR.green("✓ committed")} ${this.opCount} op(s), ${this.lastValidation.length} diagnostic(s)`);
    return result;
  }

  /** Discard the working copy; allowed any time before commit. */
  abort(reason = "aborted by caller"): EditResult {
    if (this.outcome) return this.outcome;
    return this.rollBack(new OrchestrationError(reason));
  }

  private rollBack(error: FlowError, failedOp?: number): RolledBack {
    if (this.outcome?.status === "rolled_back") return this.outcome;
    const d = error.toDiagnostic();
    const located = failedOp === undefined ? d : diagnostic(d.rule, d.message, { ...d.location, op: failedOp });
    const validation = error instanceof ValidationError || error instanceof SchemaError;
    const result: RolledBack = {
      status: "rolled_back",
      error,
      diagnostics: validation ? this.lastValidation : [located, ...this.lastValidation],
      ...(failedOp === undefined ? {} : { failedOp })
    };
    this.stateValue = "rolled_back";
    this.outcome = result;
    this.hooks.release(this);
    if (this.log.edits) this.log.line(`${COLOR.red("✗ rolled back")} ${error.name}: ${error.message}`);
    return result;
  }

  private validateOrThrow(): void {
    const diags = validateFlow(this.working, this.options.registries, { minPrecision: this.options.minPrecision });
    this.lastValidation = diags;
    if (!hasErrors(diags)) return;
    const first = diags[0];
    if (diags.length === 1 && first.rule.startsWith("SCHEMA_")) throw new SchemaError(first);
    throw new ValidationError(errorsOf(diags));
  }

  /** Current id for `id`: live steps first, then keys re-keyed earlier in this transaction. */
  private resolve(id: StepId): Step {
    const live = findStep(this.working, id);
    if (live) return live;
    let token = tokenOf(id);
    const seen = new Set<string>();
    while (token !== undefined && this.renamed.has(token) && !seen.has(token)) {
      seen.add(token);
      const next = this.renamed.get(token);
      const step = next === undefined ? undefined : findStep(this.working, next);
      if (step) return step;
      token = next === undefined ? undefined : tokenOf(next);
    }
    if (token !== undefined && this.removed.has(token)) {
      throw new OrchestrationError(`step ${id} was deleted earlier in this transaction`, { location: { step_id: id } });
    }
    throw new NotFoundError(`step ${id} not found`, { location: { step_id: id } });
  }

  private heldTokens(): Set<string> {
    const held = new Set<string>();
    for (const s of this.working.steps) {
      const t = tokenOf(s.step_id);
      if (t !== undefined) held.add(t);
    }
    return held;
  }

  /** Fails when the last op gave a step a key that references were already missing. */
  private assertNoCapture(dangling: readonly StepId[], heldBefore: ReadonlySet<string>): void {
    if (!dangling.length) return;
    const open = new Set(dangling);
    for (const s of this.working.steps) {
      const t = tokenOf(s.step_id);
      if (t === undefined || heldBefore.has(t) || !open.has(t)) continue;
      throw new OrchestrationError(`step ${s.step_id} would take over references that were already dangling`, {
        location: { step_id: s.step_id }
      });
    }
  }

  private track(changes: KeyChange[]): void {
    const moved = changes.filter(c => c.to === null || c.to !== c.from);
    if (!moved.length) return;
    rewriteReferences(this.working, mappingFromChanges(moved));
    for (const c of moved) {
      const from = tokenOf(c.from);
      if (from === undefined) continue;
      if (c.to === null) this.removed.add(from);
      else this.renamed.set(from, c.to);
    }
    this.changes.push(...moved);
  }

  private applyOp(op: EditOperation, dangling: readonly StepId[]): void {
    const keyOpts = { minPrecision: this.options.minPrecision };
    switch (op.op) {
      case "insert_after": {
        const target = this.resolve(op.target);
        this.inserted.push(insertAfter(this.working, target.step_id, structuredClone(op.step), keyOpts));
        return;
      }
      case "insert_before": {
        const target = this.resolve(op.target);
        this.inserted.push(insertBefore(this.working, target.step_id, structuredClone(op.step)));
        return;
      }
      case "delete": {
        const removed = removeStep(this.working, this.resolve(op.target).step_id);
        const change: KeyChange = { from: removed.step_id, to: null, reason: "delete" };
        if (op.cascade) {
          this.track([change]);
        } else {
          const token = tokenOf(removed.step_id);
          if (token !== undefined) this.removed.add(token);
          this.changes.push(change);
        }
        return;
      }
      case "move": {
        const target = this.resolve(op.target);
        const anchor = this.resolve(op.anchor);
        this.track([moveStep(this.working, target.step_id, anchor.step_id, op.position ?? "after", keyOpts)]);
        return;
      }
      case "update_field": {
        const target = this.resolve(op.target);
        if (op.field === "step_id") {
          const to = parseField(fieldSchemas.step_id, op.field, op.value, target.step_id);
          this.track([rekeyStep(this.working, target.step_id, to, keyOpts)]);
          return;
        }
        updateField(target, op.field, op.value);
        return;
      }
      case "renumber_all": {
        const ids = this.working.steps.map(s => s.step_id);
        const mapping = renumber(ids, op.precision, {
          stride: op.stride,
          minPrecision: this.options.minPrecision,
          reserved: dangling
        });
        this.track(applyMapping(this.working, mapping));
        return;
      }
    }
  }
}

/**
 * Owner of one committed flow. Committed snapshots are deep-frozen; at most
 * one transaction is live at a time.
 */
export class FlowSession {
  private current: Flow;
  private owner: Transaction | null = null;

  constructor(flow: Flow, readonly options: EngineOptions) {
    this.current = freezeFlow(cloneFlow(flow));
  }

  /** Last committed snapshot. */
  get flow(): Flow {
    return this.current;
  }

  get busy(): boolean {
    return this.owner !== null;
  }

  begin(): Transaction {
    if (this.owner) throw new OrchestrationError("another transaction is already open on this flow");
    const tx = new Transaction(this.current, this.options, {
      commit: (t, flow) => {
        if (this.owner !== t) throw new OrchestrationError("transaction no longer owns this flow");
        this.current = freezeFlow(flow);
        this.owner = null;
        return this.current;
      },
      release: t => {
        if (this.owner === t) this.owner = null;
      }
    });
    this.owner = tx;
    return tx;
  }

  /** Current diagnostics for the committed flow. */
  validate(): Diagnostic[] {
    return validateFlow(this.current, this.options.registries, { minPrecision: this.options.minPrecision });
  }
}

/** Apply `script` as one transaction; the session's flow changes only on commit. */
export function applyEditScript(session: FlowSession, script: EditScript): EditResult {
  const tx = session.begin();
  for (const op of script) {
    try {
      tx.apply(op);
    } catch (err) {
      if (err instanceof FlowError && tx.result) return tx.result;
      throw err;
    }
  }
  return tx.commit();
}
