// Phase state machine - strictly linear, one-directional, each phase at most once

import { PHASES, type Phase } from './types.js';
import { PhaseTransitionError } from './errors.js';

export class PhaseMachine {
  private visited: Phase[] = [];

  /** Phase currently being worked, or null before the campaign starts */
  get current(): Phase | null {
    return this.visited.length > 0 ? this.visited[this.visited.length - 1] : null;
  }

  /** The phase that must be entered next, or null once REPORTING was entered */
  get next(): Phase | null {
    return PHASES[this.visited.length] ?? null;
  }

  get history(): Phase[] {
    return [...this.visited];
  }

  get isTerminal(): boolean {
    return this.current === 'REPORTING';
  }

  /**
   * Enters `phase`. Anything other than the next phase in order is a
   * bookkeeping fault and is fatal to the campaign.
   *
   * @throws PhaseTransitionError
   */
  enter(phase: Phase): void {
    const expected = this.next;
    if (expected === null) {
      throw new PhaseTransitionError(`Cannot enter ${phase}: campaign already reached REPORTING`);
    }
    if (phase !== expected) {
      const reason = this.visited.includes(phase) ? 'already visited' : `expected ${expected}`;
      throw new PhaseTransitionError(`Cannot enter ${phase}: ${reason}`);
    }
    this.visited.push(phase);
  }

  hasVisited(phase: Phase): boolean {
    return this.visited.includes(phase);
  }
}
