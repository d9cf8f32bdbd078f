import { TIMEOUT_EVENT } from '../../config/constants';
import type { MachineDefinition } from '../types';

export interface ValidationReport {
  warnings: string[];
}

/**
 * Structural checks on a compiled machine. Nothing here stops a machine from
 * running; compile errors are thrown by the compiler instead.
 */
export function validateMachine(machine: MachineDefinition): ValidationReport {
  const warnings: string[] = [];
  const consumed = new Set(machine.transitions.map(t => t.event));

  // Reachability from the initial state over external transitions
  const reachable = new Set<string>([machine.initial]);
  const pending = [machine.initial];
  while (pending.length > 0) {
    const current = pending.pop();
    for (const transition of machine.transitions) {
      if (transition.from !== current || transition.to === undefined) continue;
      if (!reachable.has(transition.to)) {
        reachable.add(transition.to);
        pending.push(transition.to);
      }
    }
  }

  for (const state of machine.states) {
    if (!reachable.has(state.id)) {
      warnings.push(`State '${state.id}' is unreachable from '${machine.initial}'`);
    }
    const leaves = machine.transitions.some(t => t.from === state.id && t.to !== undefined && t.to !== state.id);
    if (!leaves) {
      warnings.push(`State '${state.id}' has no outgoing transition`);
    }
  }

  const withInternal = new Set(
    machine.transitions.filter(t => t.to === undefined).map(t => `${t.from}\u0000${t.event}`)
  );
  for (const t of machine.transitions) {
    if (t.to !== undefined && withInternal.has(`${t.from}\u0000${t.event}`)) {
      warnings.push(
        `Transition ${t.from} --${t.event}--> ${t.to} is never taken: ` +
        `internal transitions on '${t.event}' in '${t.from}' run instead`
      );
    }
  }

  for (const event of machine.events) {
    if (event !== TIMEOUT_EVENT && !consumed.has(event)) {
      warnings.push(`Event '${event}' is never handled by any transition`);
    }
  }

  for (const input of machine.inputs) {
    if (!consumed.has(input.event)) {
      warnings.push(`Input '${input.key}' posts '${input.event}', which no transition handles`);
    }
  }

  return { warnings };
}
