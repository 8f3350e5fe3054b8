import { describe, it, expect } from 'vitest';
import { PhaseMachine } from '../phase-machine.js';
import { PHASES } from '../types.js';
import { PhaseTransitionError } from '../errors.js';

describe('PhaseMachine', () => {
  it('walks every phase in order and ends terminal', () => {
    const machine = new PhaseMachine();
    expect(machine.current).toBeNull();
    expect(machine.next).toBe('PLANNING');

    for (const phase of PHASES) {
      machine.enter(phase);
    }

    expect(machine.history).toEqual([...PHASES]);
    expect(machine.current).toBe('REPORTING');
    expect(machine.next).toBeNull();
    expect(machine.isTerminal).toBe(true);
  });

  it('rejects skipping a phase', () => {
    const machine = new PhaseMachine();
    machine.enter('PLANNING');

    expect(() => machine.enter('ENUMERATION')).toThrow(
      'Cannot enter ENUMERATION: expected OSINT'
    );
  });

  it('rejects re-entering a visited phase', () => {
    const machine = new PhaseMachine();
    machine.enter('PLANNING');
    machine.enter('OSINT');

    expect(() => machine.enter('PLANNING')).toThrow(PhaseTransitionError);
    expect(() => machine.enter('OSINT')).toThrow('Cannot enter OSINT: already visited');
  });

  it('rejects anything after REPORTING', () => {
    const machine = new PhaseMachine();
    for (const phase of PHASES) machine.enter(phase);

    expect(() => machine.enter('REPORTING')).toThrow(
      'Cannot enter REPORTING: campaign already reached REPORTING'
    );
  });

  it('returns a copy of its history', () => {
    const machine = new PhaseMachine();
    machine.enter('PLANNING');
    machine.history.push('OSINT');

    expect(machine.history).toEqual(['PLANNING']);
    expect(machine.hasVisited('OSINT')).toBe(false);
  });
});
