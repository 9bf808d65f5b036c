import { describe, it, expect } from 'vitest';
import { applyEditScript, FlowSession } from '../edits/engine.js';
import { AmbiguousRenumberError, FormatError, NotFoundError, OrchestrationError, ValidationError } from '../errors.js';
import { silentLogger } from '../log.js';
import type { EditOperation, EditResult } from '../types/edits.js';
import { ids, makeStep, registries, sampleFlow } from './fixtures.js';

const newSession = (validatePerOp = false) => new FlowSession(sampleFlow(), { registries, logger: silentLogger, validatePerOp });
const approveStep = { actor: 'ops', action: 'approve', inputs: ['order'], outputs: [] };
const insert: EditOperation = { op: 'insert_after', target: '1.001', step: approveStep };

function rolledBack(result: EditResult) {
  if (result.status !== 'rolled_back') throw new Error(`expected a rollback, got ${result.status}`);
  return result;
}

function committed(result: EditResult) {
  if (result.status !== 'committed') throw new Error(`expected a commit, got ${result.error.message}`);
  return result;
}

describe('edit transactions', () => {
  it('commits an insert and freezes the new snapshot', () => {
    const session = newSession();
    const result = committed(applyEditScript(session, [insert]));
    expect(result.inserted).toEqual(['1.0015']);
    expect(result.diagnostics).toEqual([]);
    expect(result.flow).toBe(session.flow);
    expect(ids(session.flow)).toEqual(['1.001', '1.0015', '1.002', '1.003', '2.001', '2.002']);
    expect(Object.isFrozen(session.flow.steps[1])).toBe(true);
    expect(session.busy).toBe(false);
  });

  it('leaves the committed flow untouched when final validation fails', () => {
    const session = newSession();
    const result = rolledBack(applyEditScript(session, [
      insert,
      { op: 'update_field', target: '1.002', field: 'actor', value: 'ghost' }
    ]));
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.failedOp).toBeUndefined();
    expect(result.diagnostics.map(d => d.rule)).toEqual(['UNKNOWN_ACTOR']);
    expect(session.flow).toEqual(sampleFlow());
  });

  it('reports the failing operation index', () => {
    const session = newSession();
    const result = rolledBack(applyEditScript(session, [insert, { op: 'delete', target: '7.001' }]));
    expect(result.error).toBeInstanceOf(NotFoundError);
    expect(result.failedOp).toBe(1);
    expect(result.diagnostics[0]).toMatchObject({ rule: 'NOT_FOUND', location: { step_id: '7.001', op: 1 } });
    expect(session.flow).toEqual(sampleFlow());
  });

  it('rejects targets deleted earlier in the same script', () => {
    const result = rolledBack(applyEditScript(newSession(), [
      { op: 'delete', target: '1.003' },
      { op: 'update_field', target: '1.003', field: 'notes', value: 'late' }
    ]));
    expect(result.error).toBeInstanceOf(OrchestrationError);
    expect(result.failedOp).toBe(1);
  });

  it('follows keys renamed earlier in the same script', () => {
    const session = newSession();
    const result = committed(applyEditScript(session, [
      { op: 'move', target: '1.001', anchor: '1.003' },
      { op: 'update_field', target: '1.001', field: 'notes', value: 'moved' }
    ]));
    expect(result.changes).toEqual([{ from: '1.001', to: '1.004', reason: 'move' }]);
    const moved = session.flow.steps.find(s => s.step_id === '1.004');
    expect(moved?.notes).toBe('moved');
    expect(session.flow.steps[0].dependencies).toEqual(['1.004']);
  });

  it('keeps references dangling on a plain delete, so the commit fails', () => {
    const result = rolledBack(applyEditScript(newSession(), [{ op: 'delete', target: '2.001' }]));
    expect(result.diagnostics.map(d => d.message)).toEqual([
      'Broken goto reference: 1.003 -> 2.001',
      'Broken merge reference: 1.002 -> 2.001'
    ]);
  });

  it('prunes references on a cascading delete', () => {
    const session = newSession();
    const result = committed(applyEditScript(session, [{ op: 'delete', target: '2.001', cascade: true }]));
    expect(result.changes).toEqual([{ from: '2.001', to: null, reason: 'delete' }]);
    expect(session.flow.steps.find(s => s.step_id === '1.003')?.goto).toEqual(['END_REJECTED']);
    expect('merge_to' in session.flow.branches[0]).toBe(false);
  });

  it('rewrites references after renumbering', () => {
    const session = newSession();
    const result = committed(applyEditScript(session, [
      { op: 'insert_after', target: '1.001', step: { ...approveStep, inputs: [], dependencies: ['1.002'] } },
      { op: 'renumber_all', precision: 3 }
    ]));
    expect(result.inserted).toEqual(['1.0015']);
    expect(result.changes).toEqual([
      { from: '1.0015', to: '1.002', reason: 'renumber' },
      { from: '1.002', to: '1.003', reason: 'renumber' },
      { from: '1.003', to: '1.004', reason: 'renumber' }
    ]);
    const flow = session.flow;
    expect(ids(flow)).toEqual(['1.001', '1.002', '1.003', '1.004', '2.001', '2.002']);
    expect(flow.steps[1].dependencies).toEqual(['1.003']);
    expect(flow.steps[4].dependencies).toEqual(['1.003']);
    expect(flow.branches[0].from_step).toBe('1.003');
    expect(flow.branches[0].guards.map(g => g.to)).toEqual(['1.004', '2.002']);
    expect(session.validate()).toEqual([]);
  });

  it('never hands a dangling key to another step', () => {
    const gap = new FlowSession(
      { title: 'gap', steps: [makeStep('1.001'), makeStep('1.0015'), makeStep('1.002', { dependencies: ['1.003'] })], branches: [] },
      { registries, logger: silentLogger }
    );
    const renumbered = rolledBack(applyEditScript(gap, [{ op: 'renumber_all', precision: 3 }]));
    expect(renumbered.error).toBeInstanceOf(AmbiguousRenumberError);
    expect(renumbered.failedOp).toBe(0);
    expect(ids(gap.flow)).toEqual(['1.001', '1.0015', '1.002']);

    const jump = () => new FlowSession(
      { title: 'jump', steps: [makeStep('1.001'), makeStep('1.002', { goto: ['1.003'] })], branches: [] },
      { registries, logger: silentLogger }
    );
    const moved = rolledBack(applyEditScript(jump(), [{ op: 'move', target: '1.001', anchor: '1.002' }]));
    expect(moved.error).toBeInstanceOf(OrchestrationError);
    expect(moved.diagnostics[0]).toMatchObject({ rule: 'ORCHESTRATION', location: { step_id: '1.003', op: 0 } });
    const inserted = rolledBack(applyEditScript(jump(), [{ op: 'insert_after', target: '1.002', step: approveStep }]));
    expect(inserted.error.message).toBe('step 1.003 would take over references that were already dangling');
  });

  it('rekeys through update_field and carries references along', () => {
    const session = newSession();
    committed(applyEditScript(session, [{ op: 'update_field', target: '2.002', field: 'step_id', value: '3.001' }]));
    expect(session.flow.steps[3].calls).toEqual([{ subprocess_id: 'billing', target: '3.001' }]);
    expect(session.flow.branches[0].guards[1].to).toBe('3.001');
  });

  it('rejects malformed keys and values', () => {
    const badKey = rolledBack(applyEditScript(newSession(), [{ op: 'update_field', target: '2.002', field: 'step_id', value: '3.1' }]));
    expect(badKey.error).toBeInstanceOf(FormatError);
    const badValue = rolledBack(applyEditScript(newSession(), [{ op: 'update_field', target: '1.001', field: 'inputs', value: 'order' }]));
    expect(badValue.error).toBeInstanceOf(OrchestrationError);
    expect(badValue.failedOp).toBe(0);
  });

  it('validates after each operation when asked', () => {
    const script: EditOperation[] = [
      { op: 'update_field', target: '1.001', field: 'actor', value: 'ghost' },
      { op: 'update_field', target: '1.001', field: 'actor', value: 'user' }
    ];
    expect(applyEditScript(newSession(), script).status).toBe('committed');
    const strict = rolledBack(applyEditScript(newSession(true), script));
    expect(strict.failedOp).toBe(0);
    expect(strict.error).toBeInstanceOf(ValidationError);
  });
});

describe('session ownership', () => {
  it('allows one open transaction at a time', () => {
    const session = newSession();
    const tx = session.begin();
    expect(() => session.begin()).toThrow(OrchestrationError);
    tx.abort();
    expect(() => session.begin()).not.toThrow();
  });

  it('discards work on abort', () => {
    const session = newSession();
    const tx = session.begin();
    tx.apply(insert);
    const result = rolledBack(tx.abort());
    expect(result.error.message).toBe('aborted by caller');
    expect(tx.state).toBe('rolled_back');
    expect(ids(session.flow)).toEqual(['1.001', '1.002', '1.003', '2.001', '2.002']);
    expect(() => tx.apply(insert)).toThrow(OrchestrationError);
  });
});
