/**
 * Session Transition Tests
 */
import { describe, it, expect } from 'vitest';
import { InvalidTransitionError, SESSION_STATES } from '@sensorlink/shared';
import { SessionTransitionValidator } from './transitions.js';

describe('SessionTransitionValidator', () => {
  const validator = new SessionTransitionValidator();

  it('should only leave CLOSED by negotiating', () => {
    expect(validator.getValidTransitions(SESSION_STATES.CLOSED)).toEqual([SESSION_STATES.NEGOTIATING]);
  });

  it('should allow OPEN to pause, fail or close', () => {
    expect(validator.getValidTransitions(SESSION_STATES.OPEN)).toEqual([
      SESSION_STATES.PAUSED,
      SESSION_STATES.ERROR,
      SESSION_STATES.CLOSED,
    ]);
  });

  it('should allow ERROR to reconnect through NEGOTIATING', () => {
    expect(validator.isValidTransition(SESSION_STATES.ERROR, SESSION_STATES.NEGOTIATING)).toBe(true);
    expect(validator.isValidTransition(SESSION_STATES.ERROR, SESSION_STATES.OPEN)).toBe(false);
  });

  it('should throw InvalidTransitionError listing the valid targets', () => {
    let caught: unknown;
    try {
      validator.validateTransition(SESSION_STATES.CLOSED, SESSION_STATES.OPEN, 'session-1');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidTransitionError);
    expect(caught).toMatchObject({
      message: 'Invalid state transition: CLOSED -> OPEN',
      context: { sessionId: 'session-1', validTransitions: ['NEGOTIATING'] },
    });
  });

  it('should treat only OPEN and PAUSED as receiving', () => {
    expect(validator.isReceivingState(SESSION_STATES.OPEN)).toBe(true);
    expect(validator.isReceivingState(SESSION_STATES.PAUSED)).toBe(true);
    expect(validator.isReceivingState(SESSION_STATES.NEGOTIATING)).toBe(false);
    expect(validator.isReceivingState(SESSION_STATES.ERROR)).toBe(false);
  });
});
