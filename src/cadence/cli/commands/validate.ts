import * as path from 'path';
import { MachineDefinitionError } from '../../errors';
import { MachineLoader } from '../../machine/loader';
import { validateMachine } from '../../machine/validator';
import { resolveMachineFile } from '../resolve';

/**
 * Validate a machine file: compile errors and structural warnings
 */
export async function validateMachineFile(cwd: string, target?: string): Promise<number> {
  const file = await resolveMachineFile(cwd, target);

  console.log(`Validating ${path.relative(cwd, file) || file}...`);
  console.log('');

  const errors: string[] = [];
  const warnings: string[] = [];

  try {
    const machine = await new MachineLoader().load(file);
    console.log('\x1b[32m✓\x1b[0m Machine compiled successfully');
    console.log(`  Name:        ${machine.name}`);
    console.log(`  Initial:     ${machine.initial}`);
    console.log(`  States:      ${machine.states.length}`);
    console.log(`  Events:      ${machine.events.length}`);
    console.log(`  Transitions: ${machine.transitions.length}`);
    console.log(`  Inputs:      ${machine.inputs.length}`);

    warnings.push(...validateMachine(machine).warnings);
  } catch (err) {
    if (err instanceof MachineDefinitionError && err.issues.length > 0) {
      errors.push(...err.issues);
    } else {
      errors.push(`Failed to load machine: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  // Print summary
  console.log('');
  console.log('── Validation Summary ─────────────────');

  if (errors.length > 0) {
    console.log(`\x1b[31mErrors: ${errors.length}\x1b[0m`);
    for (const error of errors) {
      console.log(`  \x1b[31m✗\x1b[0m ${error}`);
    }
  }

  if (warnings.length > 0) {
    console.log(`\x1b[33mWarnings: ${warnings.length}\x1b[0m`);
    for (const warning of warnings) {
      console.log(`  \x1b[33m!\x1b[0m ${warning}`);
    }
  }

  if (errors.length === 0 && warnings.length === 0) {
    console.log('\x1b[32m✓ Machine is valid\x1b[0m');
  }

  console.log('');

  return errors.length > 0 ? 1 : 0;
}
