import { MachineDefinitionError } from '../errors';
import type { MachineDocumentInput } from '../types';

interface Line {
  no: number;
  text: string;
}

interface Behaviour {
  event: string;
  guard?: string;
  actions: string[];
}

interface StateDraft {
  id: string;
  label?: string;
  entry: string[];
  exit: string[];
}

const INPUT_DIRECTIVE = /^'\s*@input\s+(\S)\s+(\w+)(?:\s+(.*?))?\s*$/;
const INITIAL = /^\[\*\]\s+-{1,2}>\s+(\w+)\s*(.*)$/;
const TRANSITION = /^(\w+)\s+-{1,2}>\s+(\w+)\s*(?::\s*(.*?)\s*)?$/;
const STATE_ALIAS = /^state\s+"([^"]+)"\s+as\s+(\w+)$/;
const STATE = /^(?:state\s+)?(\w+)\s*(?::\s*(.*?)\s*)?$/;
const BEHAVIOUR = /^(\w+)\s*(?:\[\s*(.*?)\s*\])?\s*(?:\/(.*))?$/;

/**
 * Read a flat PlantUML state diagram into a machine document.
 *
 * ```
 * @startuml
 * [*] --> Idle
 * Idle : entry / start_timer(500)
 * Idle --> Busy : Timeout [timer_unarmed] / print("tick")  ' trailing comment
 * ' @input g Go Started by hand
 * @enduml
 * ```
 *
 * A `'` outside double quotes starts a comment, so action arguments in a
 * diagram are written with double quotes. Composite states are rejected.
 */
export function parsePlantUml(content: string, fallbackName?: string): MachineDocumentInput {
  const issues: string[] = [];
  const states = new Map<string, StateDraft>();
  const transitions: NonNullable<MachineDocumentInput['transitions']> = [];
  const inputs: NonNullable<MachineDocumentInput['inputs']> = [];
  const initial: string[] = [];
  let title: string | undefined;

  const declare = (id: string): StateDraft => {
    let state = states.get(id);
    if (!state) {
      state = { id, entry: [], exit: [] };
      states.set(id, state);
    }
    return state;
  };

  const lines = content.split(/\r?\n/).map((text, i) => ({ no: i + 1, text: text.trim() }));

  for (const line of lines) {
    const directive = line.text.match(INPUT_DIRECTIVE);
    if (directive) {
      const [, key, event, notice] = directive;
      inputs.push(notice ? { key, event, notice } : { key, event });
      continue;
    }

    const text = cleanup(line.text);
    if (text.startsWith('title ')) {
      title = text.slice('title '.length).trim() || title;
      continue;
    }
    if (!text || isIgnored(text)) {
      continue;
    }

    if (text === '}' || text.endsWith('{')) {
      issues.push(`${where(line)}: composite states are not supported`);
      continue;
    }

    let match = text.match(INITIAL);
    if (match) {
      if (match[2]) {
        issues.push(`${where(line)}: unexpected text after initial transition`);
      }
      declare(match[1]);
      if (initial.includes(match[1])) {
        issues.push(`${where(line)}: duplicate initial transition to ${match[1]}`);
      } else {
        initial.push(match[1]);
      }
      continue;
    }

    match = text.match(TRANSITION);
    if (match) {
      const [, from, to, behaviour] = match;
      declare(from);
      declare(to);
      if (!behaviour) {
        issues.push(`${where(line)}: transition ${from} --> ${to} has no event`);
        continue;
      }
      const parsed = parseBehaviour(behaviour, line, issues);
      if (parsed) {
        transitions.push({ from, to, event: parsed.event, ...guarded(parsed), actions: parsed.actions });
      }
      continue;
    }

    match = text.match(STATE_ALIAS);
    if (match) {
      declare(match[2]).label = match[1];
      continue;
    }

    match = text.match(STATE);
    if (match) {
      const [, id, behaviour] = match;
      const state = declare(id);
      if (!behaviour) continue;

      const parsed = parseBehaviour(behaviour, line, issues);
      if (!parsed) continue;
      if ((parsed.event === 'entry' || parsed.event === 'exit') && parsed.guard !== undefined) {
        issues.push(`${where(line)}: ${parsed.event} actions cannot have a guard`);
      } else if (parsed.event === 'entry') {
        state.entry.push(...parsed.actions);
      } else if (parsed.event === 'exit') {
        state.exit.push(...parsed.actions);
      } else {
        transitions.push({ from: id, event: parsed.event, ...guarded(parsed), actions: parsed.actions });
      }
      continue;
    }

    issues.push(`${where(line)}: cannot parse '${line.text}'`);
  }

  if (initial.length === 0) {
    issues.push('No initial state ([*] --> State)');
  } else if (initial.length > 1) {
    issues.push(`Multiple initial states: ${initial.join(', ')}`);
  }

  if (issues.length > 0) {
    throw new MachineDefinitionError('Invalid PlantUML state diagram', issues);
  }

  return {
    name: title ?? fallbackName,
    initial: initial[0],
    states: Array.from(states.values()),
    transitions,
    inputs,
  };
}

function cleanup(text: string): string {
  if (text.startsWith('@') || text.startsWith('hide ') || text.startsWith('note ')) {
    return '';
  }
  // colour tags: `state Busy #pink`
  return stripComment(text).replace(/\s#\w+/g, '').trim();
}

function stripComment(text: string): string {
  let quoted = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\\' && quoted) {
      i++;
    } else if (ch === '"') {
      quoted = !quoted;
    } else if (ch === "'" && !quoted) {
      return text.slice(0, i);
    }
  }
  return text;
}

function isIgnored(text: string): boolean {
  return text.startsWith('skinparam ') || text === 'end note';
}

function parseBehaviour(
  text: string,
  line: Line,
  issues: string[]
): Behaviour | null {
  const match = text.replace(/\\n/g, '').match(BEHAVIOUR);
  if (!match) {
    issues.push(`${where(line)}: invalid behaviour '${text}'`);
    return null;
  }
  const [, event, guard, actionText] = match;
  if (guard !== undefined && guard.length === 0) {
    issues.push(`${where(line)}: empty guard`);
    return null;
  }
  const actions = actionText
    ? actionText.split('/').map(action => action.trim()).filter(action => action.length > 0)
    : [];
  return { event, guard, actions };
}

function guarded(behaviour: Behaviour): { guard?: string } {
  return behaviour.guard === undefined ? {} : { guard: behaviour.guard };
}

function where(line: Line): string {
  return `line ${line.no}`;
}
