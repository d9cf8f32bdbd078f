import type { ActionArg, ActionCall, EventPayload } from '../types';
import { CallRegistry, durationArg, parseCall, textArg, type CallSpec } from './calls';
import type { Countdown } from './timer';

export type { ParamKind } from './calls';

/**
 * What caused the actions currently running.
 */
export interface Trigger {
  state: string;
  event: string;
  payload?: EventPayload;
}

/**
 * Services the scheduler lends to actions.
 */
export interface ActionEnvironment {
  countdown: Countdown;
  /** Queue a follow-up event; it is dispatched on the next loop iteration, never inline */
  post(event: string, payload?: EventPayload): void;
  print(text: string): void;
}

export interface ActionContext extends ActionEnvironment {
  trigger: Trigger;
}

export interface ActionSpec extends CallSpec {
  run(ctx: ActionContext, args: ActionArg[]): void;
}

/**
 * Executes a transition's action list, in order, against one trigger.
 */
export type ActionRunner = (actions: readonly ActionCall[], trigger: Trigger) => void;

/**
 * Parse an action call: `name`, `name()` or `name(arg, ...)`
 */
export function parseActionCall(source: string): ActionCall {
  return parseCall(source, 'action');
}

export class ActionRegistry extends CallRegistry<ActionSpec> {
  constructor(specs: ActionSpec[] = []) {
    super('Action', specs);
  }
}

const startTimer = (name: string): ActionSpec => ({
  name,
  params: ['duration'],
  description: 'Arm the countdown; the last write wins',
  run: (ctx, args) => ctx.countdown.arm(durationArg(args, 0)),
});

export const BUILTIN_ACTIONS: ActionSpec[] = [
  startTimer('start_timer'),
  startTimer('arm_timer'),
  {
    name: 'stop_timer',
    params: [],
    description: 'Disarm the countdown',
    run: ctx => ctx.countdown.disarm(),
  },
  {
    name: 'post',
    params: ['event'],
    description: 'Queue an event for the next loop iteration',
    run: (ctx, args) => ctx.post(textArg(args, 0)),
  },
  {
    name: 'print',
    params: ['text'],
    description: 'Write a notice line',
    run: (ctx, args) => ctx.print(textArg(args, 0)),
  },
];

export function createActionRegistry(extra: ActionSpec[] = []): ActionRegistry {
  return new ActionRegistry([...BUILTIN_ACTIONS, ...extra]);
}

export function createActionRunner(registry: ActionRegistry, env: ActionEnvironment): ActionRunner {
  return (actions, trigger) => {
    for (const call of actions) {
      const spec = registry.get(call.name);
      if (!spec) {
        throw new Error(`Unknown action '${call.name}'`);
      }
      spec.run({ ...env, trigger }, call.args);
    }
  };
}
