import type {
  ActionCall,
  EventPayload,
  InputBinding,
  MachineDefinition,
  StateDefinition,
  TransitionDefinition,
} from '../types';
import type { ActionRunner, Trigger } from './actions';
import type { GuardCheck } from './guards';

export interface Resolution {
  from: string;
  event: string;
  /** Equals `from` for internal transitions and when nothing matched */
  to: string;
  /** Exit, transition and entry actions, in the order they run */
  actions: ActionCall[];
  /** The transitions taken: several internal ones, or at most one external */
  transitions: TransitionDefinition[];
}

export interface DispatchOptions {
  payload?: EventPayload;
  /** Required once a candidate transition carries a guard */
  check?: GuardCheck;
}

interface EventHandlers {
  internal: TransitionDefinition[];
  external: TransitionDefinition[];
}

/**
 * Stateless view over a machine definition. The current state is owned by
 * whoever calls it (the scheduler); nothing here mutates it.
 *
 * Internal transitions on an event take priority over external ones: every
 * internal transition whose guard holds runs, and external transitions are
 * not considered. Otherwise the first external transition whose guard holds
 * is taken.
 */
export class FSM {
  private readonly machine: MachineDefinition;
  private readonly states = new Map<string, StateDefinition>();
  private readonly table = new Map<string, Map<string, EventHandlers>>();
  private readonly inputs = new Map<string, InputBinding>();

  constructor(machine: MachineDefinition) {
    this.machine = machine;
    for (const state of machine.states) {
      this.states.set(state.id, state);
      this.table.set(state.id, new Map());
    }
    for (const transition of machine.transitions) {
      const events = this.table.get(transition.from);
      if (!events) continue;
      let handlers = events.get(transition.event);
      if (!handlers) {
        handlers = { internal: [], external: [] };
        events.set(transition.event, handlers);
      }
      (transition.to === undefined ? handlers.internal : handlers.external).push(transition);
    }
    for (const input of machine.inputs) {
      this.inputs.set(input.key, input);
    }
    if (!this.states.has(machine.initial)) {
      throw new Error(`Initial state '${machine.initial}' is not defined`);
    }
  }

  get definition(): MachineDefinition {
    return this.machine;
  }

  get initial(): string {
    return this.machine.initial;
  }

  /**
   * Get specific state definition by ID
   */
  getStateDefinition(stateId: string): StateDefinition | undefined {
    return this.states.get(stateId);
  }

  /**
   * Get all transitions declared for a state, in declaration order
   */
  getOutgoingTransitions(stateId: string): TransitionDefinition[] {
    return this.machine.transitions.filter(t => t.from === stateId);
  }

  /**
   * Check if the event has any declared transition from the state
   */
  handles(stateId: string, event: string): boolean {
    return this.table.get(stateId)?.has(event) ?? false;
  }

  /**
   * Compute what posting `event` in `stateId` would do, without doing it.
   * When nothing matches, the state stays and no actions run.
   */
  resolve(stateId: string, event: string, options: DispatchOptions = {}): Resolution {
    const handlers = this.table.get(stateId)?.get(event);
    const none: Resolution = { from: stateId, event, to: stateId, actions: [], transitions: [] };
    if (!handlers) {
      return none;
    }

    const trigger: Trigger = { state: stateId, event, payload: options.payload };
    const holds = (transition: TransitionDefinition): boolean => {
      if (!transition.guard) return true;
      if (!options.check) {
        throw new Error(`Cannot evaluate guard '${transition.guard.source}' without a guard check`);
      }
      return options.check(transition.guard, trigger);
    };

    if (handlers.internal.length > 0) {
      const taken = handlers.internal.filter(holds);
      return { ...none, actions: taken.flatMap(t => t.actions), transitions: taken };
    }

    const transition = handlers.external.find(holds);
    if (!transition || transition.to === undefined) {
      return none;
    }

    const source = this.states.get(stateId);
    const target = this.states.get(transition.to);
    return {
      from: stateId,
      event,
      to: transition.to,
      actions: [
        ...(source?.exit ?? []),
        ...transition.actions,
        ...(target?.entry ?? []),
      ],
      transitions: [transition],
    };
  }

  /**
   * Resolve the event, run its actions in order, and return the new state
   */
  postEvent(stateId: string, event: string, run: ActionRunner, options: DispatchOptions = {}): string {
    const resolution = this.resolve(stateId, event, options);
    if (resolution.actions.length > 0) {
      run(resolution.actions, { state: stateId, event, payload: options.payload });
    }
    return resolution.to;
  }

  /**
   * Run the initial state's entry actions and return the initial state
   */
  initialize(run: ActionRunner): string {
    const initial = this.machine.initial;
    const entry = this.states.get(initial)?.entry ?? [];
    if (entry.length > 0) {
      run(entry, { state: initial, event: 'entry' });
    }
    return initial;
  }

  label(stateId: string): string {
    return this.states.get(stateId)?.label ?? stateId;
  }

  /**
   * Look up the binding for an input token (first character of a line)
   */
  input(token: string): InputBinding | undefined {
    return this.inputs.get(token);
  }
}
