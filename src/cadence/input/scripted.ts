import type { InputOutcome, InputSource } from './types';

export interface ScriptEntry {
  /** Virtual time, in ms since the start, at which the line arrives */
  at: number;
  text: string;
}

export interface Script {
  entries: ScriptEntry[];
  /** Virtual time at which the input closes */
  until?: number;
}

/**
 * Replays a script on a virtual clock. Nothing waits in real time, so a
 * whole run completes as fast as the machine can dispatch.
 */
export class ScriptedInput implements InputSource {
  private readonly entries: ScriptEntry[];
  private readonly horizon: number;
  private clock = 0;
  private cursor = 0;

  constructor(script: Script) {
    // stable sort keeps same-time lines in script order
    this.entries = [...script.entries].sort((a, b) => a.at - b.at);
    const last = this.entries[this.entries.length - 1]?.at ?? 0;
    this.horizon = Math.max(last, script.until ?? 0);
  }

  now(): number {
    return this.clock;
  }

  async next(deadline?: number): Promise<InputOutcome> {
    const entry = this.entries[this.cursor];
    if (entry && (deadline === undefined || entry.at <= deadline)) {
      this.cursor++;
      this.clock = Math.max(this.clock, entry.at);
      return { kind: 'line', text: entry.text };
    }

    if (deadline !== undefined && deadline <= this.horizon) {
      this.clock = Math.max(this.clock, deadline);
      return { kind: 'timeout' };
    }

    this.clock = Math.max(this.clock, this.horizon);
    return { kind: 'closed' };
  }
}

/**
 * Parse the script format: one `<ms> <text>` entry per line, `until <ms>`
 * to keep the input open past the last entry, `#` starts a comment.
 */
export function parseScript(content: string): Script {
  const entries: ScriptEntry[] = [];
  let until: number | undefined;

  content.split(/\r?\n/).forEach((raw, i) => {
    const line = raw.replace(/#.*$/, '').trim();
    if (!line) return;

    const horizon = line.match(/^until\s+(\d+)$/);
    if (horizon) {
      until = parseInt(horizon[1], 10);
      return;
    }

    const entry = line.match(/^(\d+)(?:\s+(.*))?$/);
    if (!entry) {
      throw new Error(`Invalid script line ${i + 1}: '${raw.trim()}'`);
    }
    entries.push({ at: parseInt(entry[1], 10), text: entry[2] ?? '' });
  });

  return { entries, until };
}
