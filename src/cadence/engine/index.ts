export { Scheduler } from './scheduler';
export type { SchedulerStatus, SchedulerOptions, Reporter, RunSummary } from './scheduler';
export { FSM } from './fsm';
export type { DispatchOptions, Resolution } from './fsm';
export { Countdown, formatCountdown } from './timer';
export type { CountdownValue } from './timer';
export {
  ActionRegistry,
  BUILTIN_ACTIONS,
  createActionRegistry,
  createActionRunner,
  parseActionCall,
} from './actions';
export type { ActionContext, ActionEnvironment, ActionRunner, ActionSpec, ParamKind, Trigger } from './actions';
export { CallRegistry, parseCall } from './calls';
export type { CallSpec } from './calls';
export {
  BUILTIN_GUARDS,
  GuardRegistry,
  createGuardCheck,
  createGuardRegistry,
  parseGuardCall,
} from './guards';
export type { GuardCheck, GuardContext, GuardSpec } from './guards';
