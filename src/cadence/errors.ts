/**
 * Raised when a machine document cannot be turned into a runnable machine.
 * Every problem found is listed in `issues`, not just the first one.
 */
export class MachineDefinitionError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'MachineDefinitionError';
    this.issues = issues;
  }
}

export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`);
}
