/**
 * @fileoverview Acquisition state machine for a single page fetch.
 *
 * ```
 * IDLE ──START──▶ NAVIGATING ──NAVIGATED──▶ WAITING_FOR_CONTENT
 *                     │                        │         │
 *                     │             CONTENT_READY   CONTENT_TIMEOUT
 *                     │                        ▼         ▼
 *                     │                     SUCCESS  TIMEOUT_FALLBACK
 *                     └──DRIVER_ERROR──▶ REINITIALIZING ──REINITIALIZED──▶ IDLE
 *                                      (or FAILED once attempts run out)
 * ```
 *
 * The machine is pure: it only decides the next state. Sleeping, relaunching
 * and reading markup belong to the page fetcher.
 */
import { AppError } from '../common/AppError.js';

export type AcquisitionPhase =
  | 'IDLE'
  | 'NAVIGATING'
  | 'WAITING_FOR_CONTENT'
  | 'SUCCESS'
  | 'TIMEOUT_FALLBACK'
  | 'REINITIALIZING'
  | 'FAILED';

export type AcquisitionEvent =
  | 'START'
  | 'NAVIGATED'
  | 'CONTENT_READY'
  | 'CONTENT_TIMEOUT'
  | 'DRIVER_ERROR'
  | 'REINITIALIZED'
  | 'RESET';

export interface AcquisitionState {
  phase: AcquisitionPhase;
  /** 1-based number of the current (or last) attempt; 0 before the first. */
  attempt: number;
  maxRetries: number;
}

type Transition = (state: AcquisitionState) => AcquisitionState;

const reset: Transition = (state) => ({ ...state, phase: 'IDLE', attempt: 0 });

const driverError: Transition = (state) => ({
  ...state,
  phase: state.attempt >= state.maxRetries ? 'FAILED' : 'REINITIALIZING',
});

const TRANSITIONS: Record<
  AcquisitionPhase,
  Partial<Record<AcquisitionEvent, Transition>>
> = {
  IDLE: {
    START: (state) => ({
      ...state,
      phase: 'NAVIGATING',
      attempt: state.attempt + 1,
    }),
  },
  NAVIGATING: {
    NAVIGATED: (state) => ({ ...state, phase: 'WAITING_FOR_CONTENT' }),
    DRIVER_ERROR: driverError,
  },
  WAITING_FOR_CONTENT: {
    CONTENT_READY: (state) => ({ ...state, phase: 'SUCCESS' }),
    CONTENT_TIMEOUT: (state) => ({ ...state, phase: 'TIMEOUT_FALLBACK' }),
    DRIVER_ERROR: driverError,
  },
  SUCCESS: { RESET: reset },
  TIMEOUT_FALLBACK: { RESET: reset },
  REINITIALIZING: {
    REINITIALIZED: (state) => ({ ...state, phase: 'IDLE' }),
  },
  FAILED: { RESET: reset },
};

export function createAcquisitionState(maxRetries: number): AcquisitionState {
  if (!Number.isInteger(maxRetries) || maxRetries < 1) {
    throw new AppError(`maxRetries must be a positive integer (got ${maxRetries})`, {
      errorCode: 'INVALID_MAX_RETRIES',
    });
  }
  return { phase: 'IDLE', attempt: 0, maxRetries };
}

/**
 * Applies an event.
 *
 * @throws {AppError} `INVALID_TRANSITION` when the event is not accepted in
 * the current phase.
 */
export function transition(
  state: AcquisitionState,
  event: AcquisitionEvent
): AcquisitionState {
  const next = TRANSITIONS[state.phase][event];
  if (!next) {
    throw new AppError(`Invalid acquisition transition: ${event} in ${state.phase}`, {
      errorCode: 'INVALID_TRANSITION',
      phase: state.phase,
      event,
    });
  }
  return next(state);
}

/** Phases that end an acquisition; only RESET leaves them. */
export function isTerminal(phase: AcquisitionPhase): boolean {
  return phase === 'SUCCESS' || phase === 'TIMEOUT_FALLBACK' || phase === 'FAILED';
}

/**
 * Exponential backoff before the attempt that follows `attempt`: 2^attempt seconds.
 */
export function backoffDelayMs(attempt: number): number {
  return 2 ** attempt * 1000;
}
