import { describe, it, expect } from 'vitest';
import { applyMapping, insertAfter, insertBefore, moveStep, rekeyStep, removeStep, renumber } from '../flow/sequencer.js';
import { compareIds } from '../flow/model.js';
import {
  AmbiguousRenumberError, DuplicateKeyError, FormatError, NotFoundError, OrchestrationError, PrecisionLossError
} from '../errors.js';
import { ids, makeStep, sampleFlow } from './fixtures.js';

const body = { actor: 'ops', action: 'approve', inputs: [], outputs: [] };

describe('insert', () => {
  it('takes the midpoint with the next step of the section', () => {
    const flow = sampleFlow();
    expect(insertAfter(flow, '1.001', body)).toBe('1.0015');
    expect(ids(flow)).toEqual(['1.001', '1.0015', '1.002', '1.003', '2.001', '2.002']);
  });

  it('appends inside the section rather than borrowing from the next one', () => {
    const flow = sampleFlow();
    expect(insertAfter(flow, '1.003', body)).toBe('1.004');
    expect(insertAfter(flow, '2.002', body)).toBe('2.003');
  });

  it('inserts before the first step of a section and between neighbours', () => {
    const flow = sampleFlow();
    expect(insertBefore(flow, '1.001', body)).toBe('1.0005');
    expect(insertBefore(flow, '1.002', body)).toBe('1.0015');
    expect(ids(flow).slice(0, 4)).toEqual(['1.0005', '1.001', '1.0015', '1.002']);
  });

  it('keeps deepening between the same two steps', () => {
    const flow = sampleFlow();
    const added = [1, 2, 3, 4].map(() => insertAfter(flow, '1.001', body));
    expect(added).toEqual(['1.0015', '1.0012', '1.0011', '1.00105']);
    const keys = ids(flow);
    for (let i = 1; i < keys.length; i++) expect(compareIds(keys[i - 1], keys[i])).toBe(-1);
  });

  it('ignores a requested step_id and fails on unknown targets', () => {
    const flow = sampleFlow();
    expect(insertAfter(flow, '1.001', { ...body, step_id: '9.999' })).toBe('1.0015');
    expect(() => insertAfter(flow, '5.001', body)).toThrow(NotFoundError);
  });
});

describe('remove / move / rekey', () => {
  it('removes a step and returns it', () => {
    const flow = sampleFlow();
    expect(removeStep(flow, '1.0020').step_id).toBe('1.002');
    expect(ids(flow)).toEqual(['1.001', '1.003', '2.001', '2.002']);
  });

  it('moves a step after an anchor', () => {
    const flow = sampleFlow();
    expect(moveStep(flow, '1.001', '1.003')).toEqual({ from: '1.001', to: '1.004', reason: 'move' });
    expect(ids(flow)).toEqual(['1.002', '1.003', '1.004', '2.001', '2.002']);
    expect(flow.steps[2].outputs).toEqual(['order']);
  });

  it('moves a step before an anchor in another section', () => {
    const flow = sampleFlow();
    expect(moveStep(flow, '2.002', '1.001', 'before')).toEqual({ from: '2.002', to: '1.0005', reason: 'move' });
  });

  it('refuses to move a step relative to itself', () => {
    expect(() => moveStep(sampleFlow(), '1.001', '1.0010')).toThrow(OrchestrationError);
  });

  it('rekeys with a strict parse and a uniqueness check', () => {
    const flow = sampleFlow();
    expect(rekeyStep(flow, '2.002', '3.001')).toEqual({ from: '2.002', to: '3.001', reason: 'rekey' });
    expect(ids(flow).at(-1)).toBe('3.001');
    expect(() => rekeyStep(flow, '3.001', '1.001')).toThrow(DuplicateKeyError);
    expect(() => rekeyStep(flow, '3.001', '3.1')).toThrow(FormatError);
  });
});

describe('renumber', () => {
  it('assigns canonical keys per section', () => {
    const mapping = renumber(['1.0005', '1.001', '1.0015', '2.5000', '3'], 3);
    expect(Object.fromEntries(mapping)).toEqual({
      '1.0005': '1.001',
      '1.001': '1.002',
      '1.0015': '1.003',
      '2.5000': '2.001',
      '3': '3.001'
    });
  });

  it('preserves order regardless of input order', () => {
    const input = ['1.003', '1.0005', '1.002', '1.00105'];
    const mapping = renumber(input, 3);
    const sorted = [...input].sort(compareIds);
    const images = sorted.map(id => mapping.get(id) ?? '');
    expect(images).toEqual(['1.001', '1.002', '1.003', '1.004']);
  });

  it('spaces keys by stride', () => {
    expect([...renumber(['1.001', '1.0015', '1.002'], 3, { stride: 10 }).values()]).toEqual(['1.010', '1.020', '1.030']);
  });

  it('rejects keys that name the same step', () => {
    expect(() => renumber(['1.001', '1.0010'], 3)).toThrow(AmbiguousRenumberError);
  });

  it('keeps images clear of reserved keys', () => {
    expect(() => renumber(['1.005', '1.006'], 3, { reserved: ['1.001'] })).toThrow(AmbiguousRenumberError);
    expect(Object.fromEntries(renumber(['2.005', '2.009'], 3, { reserved: ['1.001', '3.001'] }))).toEqual({
      '2.005': '2.001',
      '2.009': '2.002'
    });
  });

  it('fails when a section does not fit the precision', () => {
    const many = Array.from({ length: 11 }, (_, i) => `1.${String(i + 1).padStart(3, '0')}`);
    expect(() => renumber(many, 1)).toThrow(PrecisionLossError);
    expect(renumber(many.slice(0, 9), 1).get('1.009')).toBe('1.9');
  });

  it('validates its parameters', () => {
    expect(() => renumber(['1.001'], 2, { minPrecision: 3 })).toThrow(FormatError);
    expect(() => renumber(['1.001'], 3, { stride: 0 })).toThrow(FormatError);
  });
});

describe('applyMapping', () => {
  it('rekeys the flow and reports only real changes', () => {
    const flow = { title: 't', steps: [makeStep('1.001'), makeStep('1.0015'), makeStep('1.002')], branches: [] };
    const changes = applyMapping(flow, renumber(ids(flow), 3));
    expect(changes).toEqual([
      { from: '1.0015', to: '1.002', reason: 'renumber' },
      { from: '1.002', to: '1.003', reason: 'renumber' }
    ]);
    expect(ids(flow)).toEqual(['1.001', '1.002', '1.003']);
  });

  it('rejects a mapping that merges two steps', () => {
    const flow = { title: 't', steps: [makeStep('1.001'), makeStep('1.002')], branches: [] };
    expect(() => applyMapping(flow, new Map([['1.002', '1.001']]))).toThrow(DuplicateKeyError);
  });
});
