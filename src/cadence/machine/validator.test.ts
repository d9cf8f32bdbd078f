import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { validateMachine } from './validator';
import { MachineLoader } from './loader';
import { BUNDLED_TEMPLATES_DIR } from './templates';

const loader = new MachineLoader();

describe('validateMachine', () => {
  it('should find nothing to warn about in the bundled templates', async () => {
    for (const file of ['traffic-lights.yaml', 'blinker.puml']) {
      const machine = await loader.load(path.join(BUNDLED_TEMPLATES_DIR, file));
      expect(validateMachine(machine).warnings).toEqual([]);
    }
  });

  it('should warn about unreachable states and unhandled events', () => {
    const machine = loader.parse(`
initial: A
states: [A, B, C]
transitions:
  - { from: A, event: Go, to: B }
  - { from: B, event: Back, to: A }
  - { from: C, event: Go, to: A, actions: ['post(Nudge)'] }
inputs:
  - { key: x, event: Poke }
`, 'yaml');

    expect(validateMachine(machine).warnings).toEqual([
      "State 'C' is unreachable from 'A'",
      "Event 'Nudge' is never handled by any transition",
      "Event 'Poke' is never handled by any transition",
      "Input 'x' posts 'Poke', which no transition handles",
    ]);
  });

  it('should treat states with only internal or self transitions as dead ends', () => {
    const machine = loader.parse(`
initial: A
states: [A, B]
transitions:
  - { from: A, event: Go, to: B }
  - { from: B, event: Ping }
  - { from: B, event: Again, to: B }
`, 'yaml');

    expect(validateMachine(machine).warnings).toEqual(["State 'B' has no outgoing transition"]);
  });
  it('should warn about outgoing transitions hidden by internal ones on the same event', () => {
    const machine = loader.parse(`
initial: A
states: [A, B]
transitions:
  - { from: A, event: Go, actions: ['print("stay")'] }
  - { from: A, event: Go, to: B }
  - { from: B, event: Back, to: A }
`, 'yaml');

    expect(validateMachine(machine).warnings).toEqual([
      "Transition A --Go--> B is never taken: internal transitions on 'Go' in 'A' run instead",
    ]);
  });
});
