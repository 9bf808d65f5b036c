import type { Flow, Step } from '../types/flow.js';
import { registriesFrom } from '../io/registries.js';

export const registries = registriesFrom(['SYS', 'user', 'ops'], ['transform', 'notify', 'approve', 'load']);

export function makeStep(id: string, extra: Partial<Step> = {}): Step {
  return { step_id: id, actor: 'SYS', action: 'transform', inputs: [], outputs: [], ...extra };
}

/** Two sections, one branch, every reference kind; validates clean. */
export function sampleFlow(): Flow {
  return {
    title: 'Order intake',
    sections: [{ major: 1, title: 'Intake' }, { major: 2, title: 'Fulfil' }],
    steps: [
      makeStep('1.001', { outputs: ['order'] }),
      makeStep('1.002', { inputs: ['order'], outputs: ['approval'], dependencies: ['1.001'] }),
      makeStep('1.003', { inputs: ['approval'], goto: ['2.001', 'END_REJECTED'] }),
      makeStep('2.001', { action: 'notify', dependencies: ['1.002'], calls: [{ subprocess_id: 'billing', target: '2.002' }] }),
      makeStep('2.002', { action: 'load' })
    ],
    branches: [
      {
        from_step: '1.002',
        guards: [
          { label: 'approved', to: '1.003', expr: 'approval == true' },
          { label: 'rejected', to: '2.002', expr: 'approval == false' }
        ],
        merge_to: '2.001',
        cases: ['approved', 'rejected']
      }
    ]
  };
}

export const ids = (flow: Flow) => flow.steps.map(s => s.step_id);
