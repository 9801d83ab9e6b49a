/**
 * Session state transition definitions and validation
 */

import { SESSION_STATES, InvalidTransitionError, type SessionState } from '@sensorlink/shared';

export interface SessionTransition {
  from: SessionState;
  to: SessionState;
  condition?: string;
}

const VALID_TRANSITIONS: SessionTransition[] = [
  // From CLOSED
  { from: SESSION_STATES.CLOSED, to: SESSION_STATES.NEGOTIATING, condition: 'subscribe' },

  // From NEGOTIATING
  { from: SESSION_STATES.NEGOTIATING, to: SESSION_STATES.OPEN, condition: 'params_accepted' },
  { from: SESSION_STATES.NEGOTIATING, to: SESSION_STATES.ERROR, condition: 'connect_failed' },
  { from: SESSION_STATES.NEGOTIATING, to: SESSION_STATES.CLOSED, condition: 'unsubscribe' },

  // From OPEN
  { from: SESSION_STATES.OPEN, to: SESSION_STATES.PAUSED, condition: 'high_watermark' },
  { from: SESSION_STATES.OPEN, to: SESSION_STATES.ERROR, condition: 'sequence_gap_or_timeout' },
  { from: SESSION_STATES.OPEN, to: SESSION_STATES.CLOSED, condition: 'unsubscribe' },

  // From PAUSED
  { from: SESSION_STATES.PAUSED, to: SESSION_STATES.OPEN, condition: 'low_watermark' },
  { from: SESSION_STATES.PAUSED, to: SESSION_STATES.ERROR, condition: 'sequence_gap_or_overrun' },
  { from: SESSION_STATES.PAUSED, to: SESSION_STATES.CLOSED, condition: 'unsubscribe' },

  // From ERROR: reconnect, or give up
  { from: SESSION_STATES.ERROR, to: SESSION_STATES.NEGOTIATING, condition: 'reconnect' },
  { from: SESSION_STATES.ERROR, to: SESSION_STATES.CLOSED, condition: 'reconnect_exhausted' },
];

export class SessionTransitionValidator {
  private transitionMap: Map<SessionState, SessionTransition[]>;

  constructor() {
    this.transitionMap = new Map();

    for (const transition of VALID_TRANSITIONS) {
      const existing = this.transitionMap.get(transition.from) ?? [];
      existing.push(transition);
      this.transitionMap.set(transition.from, existing);
    }
  }

  isValidTransition(from: SessionState, to: SessionState): boolean {
    const transitions = this.transitionMap.get(from) ?? [];
    return transitions.some((t) => t.to === to);
  }

  getValidTransitions(from: SessionState): SessionState[] {
    const transitions = this.transitionMap.get(from) ?? [];
    return transitions.map((t) => t.to);
  }

  /**
   * Validate and throw if invalid
   */
  validateTransition(from: SessionState, to: SessionState, sessionId?: string): void {
    if (!this.isValidTransition(from, to)) {
      throw new InvalidTransitionError(from, to, {
        sessionId,
        validTransitions: this.getValidTransitions(from),
      });
    }
  }

  /**
   * Packets are only accepted while the session is live
   */
  isReceivingState(state: SessionState): boolean {
    return state === SESSION_STATES.OPEN || state === SESSION_STATES.PAUSED;
  }
}

// Singleton instance
export const sessionTransitions = new SessionTransitionValidator();
