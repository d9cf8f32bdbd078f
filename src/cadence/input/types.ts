export type InputOutcome =
  | { kind: 'timeout' }
  | { kind: 'line'; text: string }
  | { kind: 'closed' };

/**
 * The scheduler's single wait primitive: race a deadline against the next
 * line of input. Deadlines are absolute times on the source's own clock.
 */
export interface InputSource {
  now(): number;
  /**
   * Resolve with the next line, or `timeout` once `deadline` passes.
   * Without a deadline, waits for input indefinitely. A line that is already
   * available wins over an expired deadline.
   */
  next(deadline?: number): Promise<InputOutcome>;
}
