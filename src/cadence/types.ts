import { z } from 'zod';
import * as schemas from './machine/schemas';

export type MachineDocument = z.infer<typeof schemas.MachineDocumentSchema>;
export type MachineDocumentInput = z.input<typeof schemas.MachineDocumentSchema>;
export type StateDocument = z.infer<typeof schemas.StateSchema>;
export type TransitionDocument = z.infer<typeof schemas.TransitionSchema>;
export type InputBindingDocument = z.infer<typeof schemas.InputBindingSchema>;

export type ActionArg = string | number;

/**
 * Parsed action call.
 */
export interface ActionCall {
  name: string;
  args: ActionArg[];
  /** Text the call was parsed from */
  source: string;
}

/** Guards use the same call syntax as actions */
export type GuardCall = ActionCall;

/** Scalar value an event may carry to the actions it triggers */
export type EventPayload = string | number | boolean;

export interface StateDefinition {
  id: string;
  label: string;
  entry: ActionCall[];
  exit: ActionCall[];
}

export interface TransitionDefinition {
  from: string;
  event: string;
  /** Undefined for internal transitions */
  to?: string;
  /** Taken only when the guard holds */
  guard?: GuardCall;
  actions: ActionCall[];
}

export interface InputBinding {
  key: string;
  event: string;
  notice?: string;
}

/**
 * Compiled, validated machine.
 */
export interface MachineDefinition {
  name: string;
  description?: string;
  initial: string;
  states: StateDefinition[];
  /** Sorted event names, `Timeout` included */
  events: string[];
  transitions: TransitionDefinition[];
  inputs: InputBinding[];
}

// Re-export schemas for convenience
export * from './machine/schemas';
