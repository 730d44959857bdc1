import { describe, it, expect } from 'vitest';
import {
  backoffDelayMs,
  createAcquisitionState,
  isTerminal,
  transition,
  type AcquisitionEvent,
  type AcquisitionState,
} from '../retry-state-machine.js';
import { AppError } from '../../common/AppError.js';

function run(state: AcquisitionState, events: AcquisitionEvent[]): AcquisitionState {
  return events.reduce(transition, state);
}

describe('acquisition state machine', () => {
  it('walks the happy path to SUCCESS and back to IDLE', () => {
    const start = createAcquisitionState(3);
    const done = run(start, ['START', 'NAVIGATED', 'CONTENT_READY']);
    expect(done).toEqual({ phase: 'SUCCESS', attempt: 1, maxRetries: 3 });
    expect(isTerminal(done.phase)).toBe(true);
    expect(transition(done, 'RESET')).toEqual({ phase: 'IDLE', attempt: 0, maxRetries: 3 });
  });

  it('falls back to the current markup on a content timeout', () => {
    const state = run(createAcquisitionState(3), ['START', 'NAVIGATED', 'CONTENT_TIMEOUT']);
    expect(state.phase).toBe('TIMEOUT_FALLBACK');
  });

  it('reinitializes after a driver error while attempts remain', () => {
    const state = run(createAcquisitionState(3), ['START', 'DRIVER_ERROR']);
    expect(state.phase).toBe('REINITIALIZING');
    const next = run(state, ['REINITIALIZED', 'START']);
    expect(next).toEqual({ phase: 'NAVIGATING', attempt: 2, maxRetries: 3 });
  });

  it('fails on the driver error of the final attempt', () => {
    const events: AcquisitionEvent[] = [
      'START', 'DRIVER_ERROR', 'REINITIALIZED',
      'START', 'NAVIGATED', 'DRIVER_ERROR', 'REINITIALIZED',
      'START', 'DRIVER_ERROR',
    ];
    const state = run(createAcquisitionState(3), events);
    expect(state).toEqual({ phase: 'FAILED', attempt: 3, maxRetries: 3 });
  });

  it('rejects events the current phase does not accept', () => {
    const idle = createAcquisitionState(2);
    expect(() => transition(idle, 'CONTENT_READY')).toThrow(AppError);
    expect(() => transition(idle, 'CONTENT_READY')).toThrow(
      'Invalid acquisition transition: CONTENT_READY in IDLE'
    );
  });

  it('requires a positive maxRetries', () => {
    expect(() => createAcquisitionState(0)).toThrow('maxRetries must be a positive integer (got 0)');
  });

  it('doubles the backoff per attempt', () => {
    expect([1, 2, 3].map(backoffDelayMs)).toEqual([2000, 4000, 8000]);
  });
});
