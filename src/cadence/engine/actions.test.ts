import { describe, it, expect } from 'vitest';
import {
  ActionRegistry,
  createActionRegistry,
  createActionRunner,
  parseActionCall,
} from './actions';
import { Countdown } from './timer';

describe('parseActionCall', () => {
  it('should parse a call with an integer argument', () => {
    expect(parseActionCall('start_timer(2000)')).toEqual({
      name: 'start_timer',
      args: [2000],
      source: 'start_timer(2000)',
    });
  });

  it('should parse bare names and empty parentheses', () => {
    expect(parseActionCall('stop_timer').args).toEqual([]);
    expect(parseActionCall(' stop_timer() ').args).toEqual([]);
    expect(parseActionCall(' stop_timer() ').source).toBe('stop_timer()');
  });

  it('should parse quoted strings and bare words', () => {
    expect(parseActionCall('print("a, b")').args).toEqual(['a, b']);
    expect(parseActionCall("print('it\\'s')").args).toEqual(["it's"]);
    expect(parseActionCall('post(LightsBroken)').args).toEqual(['LightsBroken']);
    expect(parseActionCall('custom(1, "two", three)').args).toEqual([1, 'two', 'three']);
  });

  it('should reject malformed calls', () => {
    expect(() => parseActionCall('start_timer(')).toThrow('Malformed action call');
    expect(() => parseActionCall('print("open)')).toThrow('Unterminated string');
    expect(() => parseActionCall('custom(1,,2)')).toThrow("Invalid argument ''");
  });
});

describe('ActionRegistry', () => {
  const registry = createActionRegistry();

  it('should accept well-formed built-in calls', () => {
    expect(registry.check(parseActionCall('start_timer(2000)'))).toEqual([]);
    expect(registry.check(parseActionCall('arm_timer(0)'))).toEqual([]);
    expect(registry.check(parseActionCall('stop_timer()'))).toEqual([]);
    expect(registry.check(parseActionCall('post(Ping)'))).toEqual([]);
    expect(registry.check(parseActionCall('print("hi")'))).toEqual([]);
  });

  it('should report unknown actions and bad arguments', () => {
    expect(registry.check(parseActionCall('launch()'))).toEqual(["Unknown action 'launch'"]);
    expect(registry.check(parseActionCall('start_timer()'))).toEqual([
      "Action 'start_timer' expects 1 argument(s), got 0",
    ]);
    expect(registry.check(parseActionCall('start_timer(-5)'))).toEqual([
      "Action 'start_timer' argument 1: expected a duration in milliseconds, got -5",
    ]);
    expect(registry.check(parseActionCall('post(42)'))).toEqual([
      "Action 'post' argument 1: expected an event name, got 42",
    ]);
  });

  it('should list events referenced by event parameters', () => {
    expect(registry.referencedEvents(parseActionCall('post(Ping)'))).toEqual(['Ping']);
    expect(registry.referencedEvents(parseActionCall('print("Ping")'))).toEqual([]);
  });

  it('should refuse duplicate registrations', () => {
    const custom = new ActionRegistry();
    custom.register({ name: 'beep', params: [], run: () => undefined });
    expect(() => custom.register({ name: 'beep', params: [], run: () => undefined }))
      .toThrow('Action already registered: beep');
  });
});

describe('createActionRunner', () => {
  it('should run actions in order against the environment', () => {
    const calls: string[] = [];
    const countdown = new Countdown();
    const registry = createActionRegistry([
      { name: 'mark', params: ['text'], run: (ctx, args) => calls.push(`mark:${args[0]}@${ctx.trigger.event}`) },
    ]);
    const run = createActionRunner(registry, {
      countdown,
      post: event => calls.push(`post:${event}`),
      print: text => calls.push(`print:${text}`),
    });

    run(
      ['mark("a")', 'start_timer(500)', 'post(Next)', 'print("done")', 'mark("b")'].map(parseActionCall),
      { state: 'Idle', event: 'Go' }
    );

    expect(calls).toEqual(['mark:a@Go', 'post:Next', 'print:done', 'mark:b@Go']);
    expect(countdown.read()).toEqual({ kind: 'armed', ms: 500 });
  });

  it('should throw for actions missing from the registry', () => {
    const run = createActionRunner(new ActionRegistry(), {
      countdown: new Countdown(),
      post: () => undefined,
      print: () => undefined,
    });
    expect(() => run([parseActionCall('stop_timer()')], { state: 'A', event: 'B' }))
      .toThrow("Unknown action 'stop_timer'");
  });
});
