import { describe, expect } from 'vitest';
import { fc, test } from '@fast-check/vitest';
import { applyStatus, isTerminal } from '../../src/protocol/confirmation.js';
import type { ConfirmationState, ObservedStatus } from '../../src/protocol/confirmation.js';

const RANK: Record<ConfirmationState['stage'], number> = {
  sent: 0,
  pending: 1,
  committed: 2,
  verified: 3,
  executed: 4,
  failed: 5,
};

const observed: fc.Arbitrary<ObservedStatus> = fc.oneof(
  fc.constant<ObservedStatus>({ status: 'unknown' }),
  fc.constant<ObservedStatus>({ status: 'pending' }),
  fc.record({
    status: fc.constantFrom('committed' as const, 'verified' as const, 'executed' as const),
    blockNumber: fc.nat({ max: 1000 }),
  }),
  fc.record({ status: fc.constant('failed' as const), reason: fc.string({ maxLength: 10 }) })
);

describe('confirmation property-based tests', () => {
  test.prop([fc.array(observed, { maxLength: 30 })])('stages never move backwards', (observations) => {
    let state: ConfirmationState = { stage: 'sent' };
    for (const status of observations) {
      const next = applyStatus(state, status);
      expect(RANK[next.stage]).toBeGreaterThanOrEqual(RANK[state.stage]);
      state = next;
    }
  });

  test.prop([fc.array(observed, { maxLength: 30 })])('terminal states are absorbing', (observations) => {
    let state: ConfirmationState = { stage: 'sent' };
    let terminal: ConfirmationState | null = null;
    for (const status of observations) {
      state = applyStatus(state, status);
      if (terminal !== null) {
        expect(state).toBe(terminal);
      } else if (isTerminal(state)) {
        terminal = state;
      }
    }
  });

  test.prop([fc.array(observed, { maxLength: 30 })])('a failure is only entered from a failed observation', (observations) => {
    let state: ConfirmationState = { stage: 'sent' };
    for (const status of observations) {
      const next = applyStatus(state, status);
      if (next.stage === 'failed' && state.stage !== 'failed') {
        expect(status).toEqual({ status: 'failed', reason: next.reason });
      }
      state = next;
    }
  });
});
