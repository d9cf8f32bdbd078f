import { z } from 'zod';

const Identifier = z.string().regex(/^\w+$/, 'Must be a word (letters, digits, underscore)');

/**
 * Action call as written in a document, e.g. `start_timer(2000)`.
 * Parsed and checked against the action registry at compile time.
 */
export const ActionCallSchema = z.string().trim().min(1).describe('Action call, e.g. start_timer(2000)');

/**
 * State schema.
 * A bare string is shorthand for a state without label or actions.
 */
export const StateSchema = z.union([
  Identifier,
  z.object({
    id: Identifier.describe('State name'),
    label: z.string().optional().describe('Human readable label for diagnostics'),
    entry: z.array(ActionCallSchema).default([]).describe('Actions run when the state is entered'),
    exit: z.array(ActionCallSchema).default([]).describe('Actions run when the state is left'),
  }).strict(),
]);

/**
 * Transition schema.
 * Omitting `to` declares an internal transition: actions run, the state stays.
 * Several transitions may share a source and event when guarded: the first
 * whose guard holds is taken.
 */
export const TransitionSchema = z.object({
  from: Identifier.describe('Source state'),
  event: Identifier.describe('Triggering event'),
  to: Identifier.optional().describe('Target state'),
  guard: z.string().trim().min(1).optional().describe('Guard call, e.g. timer_armed'),
  actions: z.array(ActionCallSchema).default([]).describe('Actions run on the transition'),
}).strict();

/**
 * Input binding schema.
 * Maps a single-character token read from the input to an event.
 */
export const InputBindingSchema = z.object({
  key: z.string().length(1).describe('Single character token'),
  event: Identifier.describe('Event posted for the token'),
  notice: z.string().optional().describe('Line printed before the event is dispatched'),
}).strict();

/**
 * Machine document schema.
 */
export const MachineDocumentSchema = z.object({
  name: z.string().optional().describe('Machine name'),
  description: z.string().optional(),
  initial: Identifier.describe('Initial state'),
  states: z.array(StateSchema).min(1).describe('All states of the machine'),
  transitions: z.array(TransitionSchema).default([]),
  inputs: z.array(InputBindingSchema).default([]),
}).strict();
