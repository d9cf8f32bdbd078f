import { MAX_FOLLOW_UPS, NOTICE_PREFIX, STATE_LINE_PREFIX, TIMEOUT_EVENT } from '../../config/constants';
import { assertNever } from '../errors';
import type { InputSource } from '../input/types';
import type { EventPayload } from '../types';
import { ActionRegistry, createActionRegistry, createActionRunner, type ActionRunner } from './actions';
import { FSM } from './fsm';
import { createGuardCheck, createGuardRegistry, type GuardCheck, type GuardRegistry } from './guards';
import { Countdown, type CountdownValue } from './timer';

export type SchedulerStatus =
  | 'idle'
  | 'running'
  | 'stopped'
  | 'closed';

/**
 * Receives the loop's diagnostic lines.
 */
export interface Reporter {
  line(text: string): void;
}

export interface SchedulerOptions {
  input: InputSource;
  reporter: Reporter;
  registry?: ActionRegistry;
  guards?: GuardRegistry;
  /** Follow-up events allowed back to back without reading input */
  maxFollowUps?: number;
}

export interface RunSummary {
  status: SchedulerStatus;
  state: string;
  iterations: number;
  dispatched: number;
  dropped: number;
}

interface QueuedEvent {
  event: string;
  payload?: EventPayload;
}

/**
 * Single-threaded loop: print the state, wait for input or the countdown,
 * dispatch one event, repeat. Owns the current state and the countdown.
 *
 * Remaining time survives dropped input and dispatches that leave the
 * countdown alone; the deadline only moves when an action writes to it.
 */
export class Scheduler {
  private readonly fsm: FSM;
  private readonly input: InputSource;
  private readonly reporter: Reporter;
  private readonly countdown = new Countdown();
  private readonly queue: QueuedEvent[] = [];
  private readonly runner: ActionRunner;
  private readonly check: GuardCheck;
  private readonly maxFollowUps: number;
  private state: string;
  private deadline: number | undefined;
  private status: SchedulerStatus = 'idle';
  private iterations = 0;
  private dispatched = 0;
  private dropped = 0;
  private followUps = 0;

  constructor(fsm: FSM, options: SchedulerOptions) {
    this.fsm = fsm;
    this.input = options.input;
    this.reporter = options.reporter;
    this.state = fsm.initial;
    this.maxFollowUps = options.maxFollowUps ?? MAX_FOLLOW_UPS;
    this.check = createGuardCheck(options.guards ?? createGuardRegistry(), this.countdown);
    this.runner = createActionRunner(options.registry ?? createActionRegistry(), {
      countdown: this.countdown,
      post: (event, payload) => {
        this.queue.push({ event, payload });
      },
      print: text => this.reporter.line(`${NOTICE_PREFIX}${text}`),
    });
  }

  /**
   * Run until the input closes or stop() is called
   */
  async run(): Promise<RunSummary> {
    if (this.status !== 'idle') {
      throw new Error(`Cannot run: scheduler is ${this.status}`);
    }
    this.status = 'running';

    this.state = this.fsm.initialize(this.runner);
    this.resetDeadline();

    while (this.status === 'running') {
      this.iterations++;
      this.reporter.line(`${STATE_LINE_PREFIX}${this.fsm.label(this.state)}`);

      const queued = this.queue.shift();
      if (queued) {
        if (++this.followUps > this.maxFollowUps) {
          this.status = 'stopped';
          throw new Error(
            `Machine posted more than ${this.maxFollowUps} follow-up events in a row (last: ${queued.event})`
          );
        }
        this.dispatch(queued.event, queued.payload);
        // let stop() and signal handlers run between follow-ups
        await new Promise<void>(resolve => setImmediate(() => resolve()));
        continue;
      }

      this.followUps = 0;
      const outcome = await this.input.next(this.deadline);
      if (this.status !== 'running') break;

      switch (outcome.kind) {
        case 'timeout':
          this.dispatch(TIMEOUT_EVENT, undefined, true);
          break;
        case 'line':
          this.receive(outcome.text);
          break;
        case 'closed':
          this.status = 'closed';
          break;
        default:
          assertNever(outcome, 'input outcome');
      }
    }

    return this.summary();
  }

  /**
   * Make run() return after the current iteration
   */
  stop(): void {
    if (this.status === 'running' || this.status === 'idle') {
      this.status = 'stopped';
    }
  }

  getState(): string {
    return this.state;
  }

  getCountdown(): CountdownValue {
    return this.countdown.read();
  }

  getDeadline(): number | undefined {
    return this.deadline;
  }

  getStatus(): SchedulerStatus {
    return this.status;
  }

  summary(): RunSummary {
    return {
      status: this.status,
      state: this.state,
      iterations: this.iterations,
      dispatched: this.dispatched,
      dropped: this.dropped,
    };
  }

  private receive(text: string): void {
    const binding = text.length > 0 ? this.fsm.input(text[0]) : undefined;
    if (!binding) {
      this.dropped++;
      return;
    }
    if (binding.notice) {
      this.reporter.line(`${NOTICE_PREFIX}${binding.notice}`);
    }
    this.dispatch(binding.event);
  }

  private dispatch(event: string, payload?: EventPayload, consumesCountdown = false): void {
    const generation = this.countdown.generation;
    if (consumesCountdown) {
      this.countdown.disarm();
    }

    this.state = this.fsm.postEvent(this.state, event, this.runner, { payload, check: this.check });
    this.dispatched++;

    if (this.countdown.generation !== generation) {
      this.resetDeadline();
    }
  }

  private resetDeadline(): void {
    const value = this.countdown.read();
    this.deadline = value.kind === 'armed' ? this.input.now() + value.ms : undefined;
  }
}
