import type { ActionArg, GuardCall } from '../types';
import type { Trigger } from './actions';
import { CallRegistry, parseCall, textArg, type CallSpec } from './calls';
import type { Countdown } from './timer';

/**
 * What a guard may look at. Guards only read; they never write the countdown.
 */
export interface GuardContext {
  countdown: Pick<Countdown, 'read' | 'isArmed'>;
  trigger: Trigger;
}

export interface GuardSpec extends CallSpec {
  test(ctx: GuardContext, args: ActionArg[]): boolean;
}

/**
 * Decides whether a guarded transition may be taken for a trigger.
 */
export type GuardCheck = (guard: GuardCall, trigger: Trigger) => boolean;

export function parseGuardCall(source: string): GuardCall {
  return parseCall(source, 'guard');
}

export class GuardRegistry extends CallRegistry<GuardSpec> {
  constructor(specs: GuardSpec[] = []) {
    super('Guard', specs);
  }
}

export const BUILTIN_GUARDS: GuardSpec[] = [
  {
    name: 'timer_armed',
    params: [],
    description: 'The countdown is running',
    test: ctx => ctx.countdown.isArmed(),
  },
  {
    name: 'timer_unarmed',
    params: [],
    description: 'The countdown is not running',
    test: ctx => !ctx.countdown.isArmed(),
  },
  {
    name: 'payload_is',
    params: ['text'],
    description: 'The event carries this payload, compared as text',
    test: (ctx, args) => ctx.trigger.payload !== undefined && String(ctx.trigger.payload) === textArg(args, 0),
  },
];

export function createGuardRegistry(extra: GuardSpec[] = []): GuardRegistry {
  return new GuardRegistry([...BUILTIN_GUARDS, ...extra]);
}

export function createGuardCheck(registry: GuardRegistry, countdown: GuardContext['countdown']): GuardCheck {
  return (guard, trigger) => {
    const spec = registry.get(guard.name);
    if (!spec) {
      throw new Error(`Unknown guard '${guard.name}'`);
    }
    return spec.test({ countdown, trigger }, guard.args);
  };
}
