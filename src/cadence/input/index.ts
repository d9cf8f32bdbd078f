export type { InputOutcome, InputSource } from './types';
export { LineInput } from './line';
export { ScriptedInput, parseScript, type Script, type ScriptEntry } from './scripted';
