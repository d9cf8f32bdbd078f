import { FSM } from '../../engine/fsm';
import { Scheduler, type Reporter } from '../../engine/scheduler';
import { LineInput } from '../../input/line';
import { MachineLoader } from '../../machine/loader';
import { resolveMachineFile } from '../resolve';

const stdoutReporter: Reporter = {
  line: text => {
    process.stdout.write(`${text}\n`);
  },
};

/**
 * Run a machine against stdin until EOF or Ctrl+C
 */
export async function runMachine(cwd: string, target?: string): Promise<number> {
  const file = await resolveMachineFile(cwd, target);
  const machine = await new MachineLoader().load(file);
  const fsm = new FSM(machine);

  // Hints go to stderr so stdout carries only the state trace
  console.error(`Running ${machine.name}`);
  for (const input of machine.inputs) {
    console.error(`  ${input.key} + RETURN  → ${input.event}`);
  }
  console.error('');

  const input = new LineInput(process.stdin);
  const scheduler = new Scheduler(fsm, { input, reporter: stdoutReporter });

  const onSignal = () => {
    scheduler.stop();
    input.close();
  };
  process.once('SIGINT', onSignal);

  try {
    const summary = await scheduler.run();
    console.error('');
    console.error(`Stopped in ${fsm.label(summary.state)} (${summary.dispatched} event(s) dispatched)`);
    return 0;
  } finally {
    process.off('SIGINT', onSignal);
    input.close();
  }
}
