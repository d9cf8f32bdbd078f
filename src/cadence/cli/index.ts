import { runMachine } from './commands/run';
import { simulateMachine } from './commands/simulate';
import { validateMachineFile } from './commands/validate';
import { inspectMachine } from './commands/inspect';
import { listMachineTemplates } from './commands/templates';
import { initMachine } from './commands/init';

export async function runCadenceCli(args: string[], cwd: string = process.cwd()): Promise<number> {
  const command = args[0] ?? 'run';
  const restArgs = args.slice(1);

  try {
    switch (command) {
      case 'run':
        return await runMachine(cwd, restArgs[0]);

      case 'simulate':
        return await simulateMachine(cwd, restArgs[0], restArgs[1]);

      case 'validate':
        return await validateMachineFile(cwd, restArgs[0]);

      case 'inspect':
        return await inspectMachine(cwd, restArgs[0]);

      case 'templates':
        return await listMachineTemplates();

      case 'init':
        return await initMachine(cwd, restArgs[0]);

      case 'help':
      case '--help':
      case '-h':
        printHelp();
        return 0;

      default:
        console.error(`Unknown command: ${command}`);
        printHelp();
        return 1;
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

function printHelp(): void {
  console.log(`
Cadence - Event-driven state machine runtime

Usage: cadence [command] [arguments]

Commands:
  run [machine]                 Run a machine against keyboard input (default)
  simulate <machine> <script>   Replay a scripted input on a virtual clock
  validate [machine]            Check a machine file for errors and warnings
  inspect [machine]             Show states, events and transitions
  templates                     List available templates
  init [template]               Copy a template to ./machine.<ext>
  help                          Show this help message

A machine is a .yaml/.yml/.puml file or a template name. Without one,
./machine.yaml (or .yml, .puml) is used, then the traffic-lights template.

Examples:
  cadence                               # Run the traffic lights
  cadence run blinker                   # Run a bundled template
  cadence simulate machine.yaml run.txt # Replay run.txt
`);
}
