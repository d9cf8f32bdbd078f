import { MachineLoader } from '../../machine/loader';
import type { ActionCall, MachineDefinition } from '../../types';
import { resolveMachineFile } from '../resolve';

/**
 * Print states, events, inputs and the transition table of a machine
 */
export async function inspectMachine(cwd: string, target?: string): Promise<number> {
  const file = await resolveMachineFile(cwd, target);
  const machine = await new MachineLoader().load(file);
  for (const line of describeMachine(machine)) {
    console.log(line);
  }
  return 0;
}

export function describeMachine(machine: MachineDefinition): string[] {
  const lines: string[] = [];

  lines.push(`Machine:  ${machine.name}`);
  if (machine.description) {
    lines.push(`          ${machine.description}`);
  }
  lines.push(`Initial:  ${machine.initial}`);

  lines.push('');
  lines.push('── States ─────────────────────────────');
  for (const state of machine.states) {
    const label = state.label !== state.id ? ` "${state.label}"` : '';
    lines.push(`  ${state.id}${label}`);
    if (state.entry.length > 0) lines.push(`    entry / ${formatActions(state.entry)}`);
    if (state.exit.length > 0) lines.push(`    exit  / ${formatActions(state.exit)}`);
  }

  lines.push('');
  lines.push('── Events ─────────────────────────────');
  lines.push(`  ${machine.events.join(', ')}`);

  if (machine.inputs.length > 0) {
    lines.push('');
    lines.push('── Inputs ─────────────────────────────');
    for (const input of machine.inputs) {
      lines.push(`  ${input.key}  → ${input.event}`);
    }
  }

  lines.push('');
  lines.push('── Transitions ────────────────────────');
  for (const t of machine.transitions) {
    const actions = t.actions.length > 0 ? ` / ${formatActions(t.actions)}` : '';
    const guard = t.guard ? ` [${t.guard.source}]` : '';
    lines.push(`  ${t.from} --${t.event}${guard}--> ${t.to ?? '(internal)'}${actions}`);
  }

  return lines;
}

function formatActions(actions: ActionCall[]): string {
  return actions.map(a => a.source).join(' / ');
}
