import { MAX_TIMER_MS } from '../../config/constants';
import { assertNever } from '../errors';
import type { ActionArg, ActionCall } from '../types';

export type ParamKind = 'duration' | 'event' | 'text';

/**
 * What every registered callable (action or guard) declares about itself.
 */
export interface CallSpec {
  name: string;
  params: ParamKind[];
  description?: string;
}

const CALL_PATTERN = /^(\w+)\s*(?:\(\s*(.*?)\s*\))?$/s;

/**
 * Parse `name`, `name()` or `name(arg, ...)`.
 * Arguments are integers, quoted strings or bare words.
 */
export function parseCall(source: string, noun: string): ActionCall {
  const text = source.trim();
  const match = text.match(CALL_PATTERN);
  if (!match) {
    throw new Error(`Malformed ${noun} call: ${source}`);
  }
  const [, name, argText] = match;
  return {
    name,
    args: argText ? splitArgs(argText, `${noun} call: ${text}`) : [],
    source: text,
  };
}

function splitArgs(text: string, where: string): ActionArg[] {
  const parts: string[] = [];
  let current = '';
  let quote: string | null = null;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      current += ch;
      if (ch === '\\' && i + 1 < text.length) {
        current += text[++i];
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
    } else if (ch === ',') {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }

  if (quote) {
    throw new Error(`Unterminated string in ${where}`);
  }
  parts.push(current);
  return parts.map(part => parseArg(part.trim(), where));
}

function parseArg(raw: string, where: string): ActionArg {
  if (/^-?\d+$/.test(raw)) {
    return Number(raw);
  }
  const quoted = raw.match(/^(["'])(.*)\1$/s);
  if (quoted) {
    return quoted[2].replace(/\\(.)/gs, '$1');
  }
  if (/^\w+$/.test(raw)) {
    return raw;
  }
  throw new Error(`Invalid argument '${raw}' in ${where}`);
}

function describeArg(arg: ActionArg | undefined): string {
  return arg === undefined ? 'nothing' : JSON.stringify(arg);
}

function checkParam(kind: ParamKind, arg: ActionArg): string | null {
  switch (kind) {
    case 'duration':
      return typeof arg === 'number' && Number.isInteger(arg) && arg >= 0 && arg <= MAX_TIMER_MS
        ? null
        : `expected a duration in milliseconds, got ${describeArg(arg)}`;
    case 'event':
      return typeof arg === 'string' && /^\w+$/.test(arg)
        ? null
        : `expected an event name, got ${describeArg(arg)}`;
    case 'text':
      return typeof arg === 'string' ? null : `expected a string, got ${describeArg(arg)}`;
    default:
      return assertNever(kind, 'parameter kind');
  }
}

export function durationArg(args: ActionArg[], index: number): number {
  const arg = args[index];
  if (typeof arg !== 'number') {
    throw new TypeError(`Argument ${index + 1} must be a number, got ${describeArg(arg)}`);
  }
  return arg;
}

export function textArg(args: ActionArg[], index: number): string {
  const arg = args[index];
  if (typeof arg !== 'string') {
    throw new TypeError(`Argument ${index + 1} must be a string, got ${describeArg(arg)}`);
  }
  return arg;
}

/**
 * Named callables with typed parameters. `noun` names them in messages
 * (`Action`, `Guard`).
 */
export class CallRegistry<Spec extends CallSpec> {
  private specs = new Map<string, Spec>();
  protected readonly noun: string;

  constructor(noun: string, specs: Spec[] = []) {
    this.noun = noun;
    for (const spec of specs) {
      this.register(spec);
    }
  }

  register(spec: Spec): this {
    if (this.specs.has(spec.name)) {
      throw new Error(`${this.noun} already registered: ${spec.name}`);
    }
    this.specs.set(spec.name, spec);
    return this;
  }

  get(name: string): Spec | undefined {
    return this.specs.get(name);
  }

  has(name: string): boolean {
    return this.specs.has(name);
  }

  list(): Spec[] {
    return Array.from(this.specs.values());
  }

  /**
   * Parse a call written in a machine document
   */
  parse(source: string): ActionCall {
    return parseCall(source, this.noun.toLowerCase());
  }

  /**
   * Problems that would stop the call from running; empty when it is fine.
   */
  check(call: ActionCall): string[] {
    const spec = this.specs.get(call.name);
    if (!spec) {
      return [`Unknown ${this.noun.toLowerCase()} '${call.name}'`];
    }
    if (call.args.length !== spec.params.length) {
      return [`${this.noun} '${call.name}' expects ${spec.params.length} argument(s), got ${call.args.length}`];
    }

    const issues: string[] = [];
    spec.params.forEach((kind, i) => {
      const problem = checkParam(kind, call.args[i]);
      if (problem) {
        issues.push(`${this.noun} '${call.name}' argument ${i + 1}: ${problem}`);
      }
    });
    return issues;
  }

  /**
   * Event names a call refers to through `event` parameters.
   */
  referencedEvents(call: ActionCall): string[] {
    const spec = this.specs.get(call.name);
    if (!spec) return [];
    return spec.params.flatMap((kind, i) => {
      const arg = call.args[i];
      return kind === 'event' && typeof arg === 'string' ? [arg] : [];
    });
  }
}
