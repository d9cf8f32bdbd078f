import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { FSM } from './fsm';
import { createActionRegistry, createActionRunner, type ActionRunner, type Trigger } from './actions';
import { Countdown } from './timer';
import { MachineLoader } from '../machine/loader';
import { createGuardRegistry, type GuardCheck } from './guards';

const SAMPLE = `
name: sample
initial: A
states:
  - id: A
    entry: ['print("enter A")']
    exit: ['print("exit A")']
  - id: B
    label: Bee
    entry: ['print("enter B")']
  - C
transitions:
  - { from: A, event: Go, to: B, actions: ['print("go")'] }
  - { from: B, event: Ping, actions: ['print("pong")'] }
  - { from: B, event: Reset, to: B }
  - { from: B, event: Back, to: A }
inputs:
  - { key: g, event: Go }
`;

function recorder(): { run: ActionRunner; calls: Array<{ actions: string[]; trigger: Trigger }> } {
  const calls: Array<{ actions: string[]; trigger: Trigger }> = [];
  return {
    calls,
    run: (actions, trigger) => {
      calls.push({ actions: actions.map(a => a.source), trigger });
    },
  };
}

describe('FSM', () => {
  const fsm = new FSM(new MachineLoader().parse(SAMPLE, 'yaml'));

  describe('resolve', () => {
    it('should order exit, transition and entry actions', () => {
      const resolution = fsm.resolve('A', 'Go');
      expect(resolution.to).toBe('B');
      expect(resolution.actions.map(a => a.source)).toEqual([
        'print("exit A")',
        'print("go")',
        'print("enter B")',
      ]);
    });

    it('should stay put with no actions for undeclared pairs', () => {
      expect(fsm.resolve('A', 'Ping')).toEqual({ from: 'A', event: 'Ping', to: 'A', actions: [], transitions: [] });
      expect(fsm.resolve('C', 'Timeout')).toEqual({
        from: 'C',
        event: 'Timeout',
        to: 'C',
        actions: [],
        transitions: [],
      });
    });

    it('should run only transition actions for internal transitions', () => {
      const resolution = fsm.resolve('B', 'Ping');
      expect(resolution.to).toBe('B');
      expect(resolution.actions.map(a => a.source)).toEqual(['print("pong")']);
    });

    it('should treat declared self-transitions as external', () => {
      const resolution = fsm.resolve('B', 'Reset');
      expect(resolution.to).toBe('B');
      expect(resolution.actions.map(a => a.source)).toEqual(['print("enter B")']);
    });
  });

  describe('postEvent', () => {
    it('should run actions once and return the new state', () => {
      const { run, calls } = recorder();
      expect(fsm.postEvent('A', 'Go', run)).toBe('B');
      expect(calls).toEqual([
        {
          actions: ['print("exit A")', 'print("go")', 'print("enter B")'],
          trigger: { state: 'A', event: 'Go' },
        },
      ]);
    });

    it('should pass the payload to the runner', () => {
      const { run, calls } = recorder();
      fsm.postEvent('B', 'Ping', run, { payload: 7 });
      expect(calls[0].trigger).toEqual({ state: 'B', event: 'Ping', payload: 7 });
    });

    it('should not call the runner for undeclared pairs', () => {
      const { run, calls } = recorder();
      expect(fsm.postEvent('C', 'Go', run)).toBe('C');
      expect(calls).toEqual([]);
    });
  });

  it('should run the initial entry actions on initialize', () => {
    const { run, calls } = recorder();
    expect(fsm.initialize(run)).toBe('A');
    expect(calls).toEqual([{ actions: ['print("enter A")'], trigger: { state: 'A', event: 'entry' } }]);
  });

  it('should expose labels, inputs and transitions', () => {
    expect(fsm.label('B')).toBe('Bee');
    expect(fsm.label('C')).toBe('C');
    expect(fsm.input('g')).toEqual({ key: 'g', event: 'Go', notice: undefined });
    expect(fsm.input('x')).toBeUndefined();
    expect(fsm.getOutgoingTransitions('B').map(t => t.event)).toEqual(['Ping', 'Reset', 'Back']);
    expect(fsm.handles('B', 'Back')).toBe(true);
    expect(fsm.handles('C', 'Back')).toBe(false);
    expect(fsm.getStateDefinition('Z')).toBeUndefined();
  });

  it('should refuse a definition whose initial state is missing', () => {
    expect(() => new FSM({ ...fsm.definition, initial: 'Z' })).toThrow("Initial state 'Z' is not defined");
  });
});

const GUARDED = `
initial: Idle
states:
  - Idle
  - id: Fast
    entry: ['print("fast")']
  - Slow
  - Busy
transitions:
  - { from: Idle, event: Go, to: Fast, guard: 'flag(fast)' }
  - { from: Idle, event: Go, to: Slow, guard: 'flag(slow)' }
  - { from: Slow, event: Go, to: Fast }
  - { from: Busy, event: Go, guard: 'flag(one)', actions: ['print("one")'] }
  - { from: Busy, event: Go, actions: ['print("two")'] }
  - { from: Busy, event: Go, to: Idle }
`;

describe('FSM with guards', () => {
  const guards = createGuardRegistry([{ name: 'flag', params: ['text'], test: () => false }]);
  const fsm = new FSM(new MachineLoader(createActionRegistry(), guards).parse(GUARDED, 'yaml'));
  const flags = (...set: string[]): GuardCheck => guard => set.includes(String(guard.args[0]));

  it('should take the first transition whose guard holds', () => {
    const both = fsm.resolve('Idle', 'Go', { check: flags('fast', 'slow') });
    expect(both.to).toBe('Fast');
    expect(both.actions.map(a => a.source)).toEqual(['print("fast")']);

    expect(fsm.resolve('Idle', 'Go', { check: flags('slow') }).to).toBe('Slow');
  });

  it('should stay put when no guard holds', () => {
    expect(fsm.resolve('Idle', 'Go', { check: flags() })).toEqual({
      from: 'Idle',
      event: 'Go',
      to: 'Idle',
      actions: [],
      transitions: [],
    });
  });

  it('should run every internal transition whose guard holds, ahead of external ones', () => {
    const unflagged = fsm.resolve('Busy', 'Go', { check: flags() });
    expect(unflagged.to).toBe('Busy');
    expect(unflagged.actions.map(a => a.source)).toEqual(['print("two")']);

    const flagged = fsm.resolve('Busy', 'Go', { check: flags('one') });
    expect(flagged.to).toBe('Busy');
    expect(flagged.actions.map(a => a.source)).toEqual(['print("one")', 'print("two")']);
    expect(flagged.transitions).toHaveLength(2);
  });

  it('should hand the trigger and payload to the guard check', () => {
    const seen: Trigger[] = [];
    fsm.resolve('Idle', 'Go', {
      payload: 'x',
      check: (_guard, trigger) => {
        seen.push(trigger);
        return false;
      },
    });
    expect(seen).toEqual([
      { state: 'Idle', event: 'Go', payload: 'x' },
      { state: 'Idle', event: 'Go', payload: 'x' },
    ]);
  });

  it('should not consult guards of unguarded transitions', () => {
    expect(fsm.resolve('Slow', 'Go').to).toBe('Fast');
  });

  it('should refuse to evaluate a guard without a check', () => {
    expect(() => fsm.resolve('Idle', 'Go')).toThrow("Cannot evaluate guard 'flag(fast)' without a guard check");
  });
});

describe('FSM with the traffic-lights template', () => {
  const templateFile = path.join(__dirname, '..', 'templates', 'traffic-lights.yaml');

  it('should leave state and countdown alone for every unhandled pair', async () => {
    const fsm = new FSM(await new MachineLoader().load(templateFile));
    const countdown = new Countdown();
    const run = createActionRunner(createActionRegistry(), {
      countdown,
      post: () => undefined,
      print: () => undefined,
    });

    for (const state of fsm.definition.states) {
      for (const event of fsm.definition.events) {
        if (fsm.handles(state.id, event)) continue;
        const before = countdown.generation;
        expect(fsm.postEvent(state.id, event, run)).toBe(state.id);
        expect(countdown.generation).toBe(before);
      }
    }
  });

  it('should give the same result for the same state, event and countdown', async () => {
    const fsm = new FSM(await new MachineLoader().load(templateFile));
    const outcomes = [1, 2].map(() => {
      const countdown = new Countdown();
      countdown.arm(2000);
      const run = createActionRunner(createActionRegistry(), {
        countdown,
        post: () => undefined,
        print: () => undefined,
      });
      const state = fsm.postEvent('RedOnly', 'Timeout', run);
      return { state, countdown: countdown.read() };
    });

    expect(outcomes[0]).toEqual({ state: 'RedYellow', countdown: { kind: 'armed', ms: 1000 } });
    expect(outcomes[1]).toEqual(outcomes[0]);
  });
});
