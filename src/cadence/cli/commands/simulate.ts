import * as fs from 'fs/promises';
import * as path from 'path';
import { FSM } from '../../engine/fsm';
import { Scheduler } from '../../engine/scheduler';
import { ScriptedInput, parseScript } from '../../input/scripted';
import { MachineLoader } from '../../machine/loader';
import { resolveMachineFile } from '../resolve';

/**
 * Replay a scripted input against a machine on a virtual clock
 */
export async function simulateMachine(cwd: string, target?: string, scriptFile?: string): Promise<number> {
  if (!target || !scriptFile) {
    console.error('Usage: cadence simulate <machine> <script>');
    return 1;
  }

  const file = await resolveMachineFile(cwd, target);
  const machine = await new MachineLoader().load(file);
  const script = parseScript(await fs.readFile(path.resolve(cwd, scriptFile), 'utf-8'));

  const input = new ScriptedInput(script);
  const scheduler = new Scheduler(new FSM(machine), {
    input,
    reporter: { line: text => console.log(`${formatClock(input.now())}  ${text}`) },
  });

  const summary = await scheduler.run();

  console.log('');
  console.log(
    `Finished in ${summary.state} at ${input.now()}ms: ` +
    `${summary.dispatched} event(s) dispatched, ${summary.dropped} input(s) dropped`
  );
  return 0;
}

export function formatClock(ms: number): string {
  return `[${String(ms).padStart(7)}ms]`;
}
