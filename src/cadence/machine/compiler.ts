import { TIMEOUT_EVENT } from '../../config/constants';
import { ActionRegistry, createActionRegistry } from '../engine/actions';
import type { CallRegistry, CallSpec } from '../engine/calls';
import { GuardRegistry, createGuardRegistry } from '../engine/guards';
import { MachineDefinitionError } from '../errors';
import type {
  ActionCall,
  InputBinding,
  MachineDefinition,
  MachineDocument,
  StateDefinition,
  TransitionDefinition,
} from '../types';

export interface CompileOptions {
  registry?: ActionRegistry;
  guards?: GuardRegistry;
  /** Used when the document has no name of its own */
  name?: string;
}

/**
 * Turn a schema-valid document into a machine definition.
 * Collects every problem before failing.
 */
export function compileMachine(doc: MachineDocument, options: CompileOptions = {}): MachineDefinition {
  const registry = options.registry ?? createActionRegistry();
  const guards = options.guards ?? createGuardRegistry();
  const issues: string[] = [];
  const events = new Set<string>([TIMEOUT_EVENT]);

  const compileCall = <Spec extends CallSpec>(
    calls: CallRegistry<Spec>,
    source: string,
    where: string
  ): ActionCall | undefined => {
    let call: ActionCall;
    try {
      call = calls.parse(source);
    } catch (err) {
      issues.push(`${where}: ${err instanceof Error ? err.message : String(err)}`);
      return undefined;
    }
    const problems = calls.check(call);
    if (problems.length > 0) {
      issues.push(...problems.map(problem => `${where}: ${problem}`));
      return undefined;
    }
    calls.referencedEvents(call).forEach(event => events.add(event));
    return call;
  };

  const compileActions = (sources: string[], where: string): ActionCall[] =>
    sources.flatMap(source => compileCall(registry, source, where) ?? []);

  // States
  const states: StateDefinition[] = [];
  const stateIds = new Set<string>();
  for (const entry of doc.states) {
    const state = typeof entry === 'string'
      ? { id: entry, label: undefined, entry: [], exit: [] }
      : entry;
    if (stateIds.has(state.id)) {
      issues.push(`Duplicate state '${state.id}'`);
      continue;
    }
    stateIds.add(state.id);
    states.push({
      id: state.id,
      label: state.label ?? state.id,
      entry: compileActions(state.entry, `State '${state.id}' entry`),
      exit: compileActions(state.exit, `State '${state.id}' exit`),
    });
  }

  if (!stateIds.has(doc.initial)) {
    issues.push(`Initial state '${doc.initial}' is not defined`);
  }

  // Transitions
  const transitions: TransitionDefinition[] = [];
  // (state, event) pairs that already have an unguarded external transition
  const settled = new Set<string>();
  for (const transition of doc.transitions) {
    const guardText = transition.guard ? ` [${transition.guard}]` : '';
    const where = `Transition ${transition.from} --${transition.event}${guardText}--> ${transition.to ?? '(internal)'}`;
    if (!stateIds.has(transition.from)) {
      issues.push(`${where}: unknown source state '${transition.from}'`);
    }
    if (transition.to !== undefined && !stateIds.has(transition.to)) {
      issues.push(`${where}: unknown target state '${transition.to}'`);
    }
    if (transition.to !== undefined) {
      const key = `${transition.from}\u0000${transition.event}`;
      if (settled.has(key)) {
        issues.push(
          `${where}: state '${transition.from}' already handles event '${transition.event}' without a guard`
        );
      }
      if (!transition.guard) {
        settled.add(key);
      }
    }
    events.add(transition.event);
    const guard = transition.guard === undefined ? undefined : compileCall(guards, transition.guard, where);
    transitions.push({
      from: transition.from,
      event: transition.event,
      to: transition.to,
      ...(guard ? { guard } : {}),
      actions: compileActions(transition.actions, where),
    });
  }

  // Inputs
  const inputs: InputBinding[] = [];
  const keys = new Set<string>();
  for (const input of doc.inputs) {
    if (keys.has(input.key)) {
      issues.push(`Input key '${input.key}' is bound more than once`);
      continue;
    }
    keys.add(input.key);
    events.add(input.event);
    inputs.push({ key: input.key, event: input.event, notice: input.notice });
  }

  if (issues.length > 0) {
    throw new MachineDefinitionError(`Invalid machine '${doc.name ?? options.name ?? 'machine'}'`, issues);
  }

  return {
    name: doc.name ?? options.name ?? 'machine',
    description: doc.description,
    initial: doc.initial,
    states,
    events: Array.from(events).sort(),
    transitions,
    inputs,
  };
}
