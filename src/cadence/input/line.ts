import * as readline from 'readline';
import type { InputOutcome, InputSource } from './types';

/**
 * Line input over a readable stream (stdin by default), on wall-clock time.
 * Lines that arrive while nobody is waiting are buffered in order.
 */
export class LineInput implements InputSource {
  private readonly rl: readline.Interface;
  private readonly clock: () => number;
  private readonly buffered: string[] = [];
  private ended = false;
  private waiter: ((outcome: InputOutcome) => void) | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(stream: NodeJS.ReadableStream = process.stdin, clock: () => number = Date.now) {
    this.clock = clock;
    this.rl = readline.createInterface({ input: stream, terminal: false });
    this.rl.on('line', line => this.receive(line));
    this.rl.on('close', () => this.finish());
  }

  now(): number {
    return this.clock();
  }

  next(deadline?: number): Promise<InputOutcome> {
    if (this.waiter) {
      return Promise.reject(new Error('LineInput already has a pending wait'));
    }

    const line = this.buffered.shift();
    if (line !== undefined) {
      return Promise.resolve({ kind: 'line', text: line });
    }
    if (this.ended) {
      return Promise.resolve({ kind: 'closed' });
    }

    return new Promise(resolve => {
      this.waiter = resolve;
      if (deadline !== undefined) {
        const delay = Math.max(0, deadline - this.now());
        this.timer = setTimeout(() => this.settle({ kind: 'timeout' }), delay);
      }
    });
  }

  /**
   * Stop reading; a pending wait resolves with `closed`
   */
  close(): void {
    this.rl.close();
  }

  private receive(line: string): void {
    if (this.waiter) {
      this.settle({ kind: 'line', text: line });
    } else {
      this.buffered.push(line);
    }
  }

  private finish(): void {
    this.ended = true;
    if (this.waiter && this.buffered.length === 0) {
      this.settle({ kind: 'closed' });
    }
  }

  private settle(outcome: InputOutcome): void {
    const resolve = this.waiter;
    this.waiter = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    resolve?.(outcome);
  }
}
