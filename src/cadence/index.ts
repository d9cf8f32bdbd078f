// Machine definitions
export { MachineLoader, detectFormat, type MachineFormat } from './machine/loader';
export { compileMachine, type CompileOptions } from './machine/compiler';
export { parsePlantUml } from './machine/plantuml';
export { validateMachine, type ValidationReport } from './machine/validator';
export { listTemplates, findTemplate, type TemplateInfo } from './machine/templates';

// Engine
export * from './engine';

// Input
export * from './input';

// Errors
export { MachineDefinitionError } from './errors';

// Types
export * from './types';
