import { TelemetryContext, isWorkerInternal } from './telemetry';

describe('TelemetryContext', () => {
  let now: number;
  let telemetry: TelemetryContext;

  beforeEach(() => {
    now = 1000;
    telemetry = new TelemetryContext(() => now);
  });

  it('should measure the time between start and stop', () => {
    telemetry.start('commit');
    now += 0.25;

    expect(telemetry.stop('commit')).toBeCloseTo(0.25);
    expect(telemetry.get('commit')).toBeCloseTo(0.25);
    expect(telemetry.isRunning('commit')).toBe(false);
  });

  it('should throw when stopping a timer that never started', () => {
    expect(() => telemetry.stop('ack')).toThrow("Timer 'ack' was never started");
  });

  it('should keep entries in start order even when stopped out of order', () => {
    telemetry.start('total');
    telemetry.start('decode');
    now += 1;
    telemetry.stop('decode');
    telemetry.record('queue wait', 0.5);
    telemetry.stop('total');

    expect(telemetry.entries().map(([name]) => name)).toEqual(['total', 'decode', 'queue wait']);
  });

  it('should store marks as absolute values', () => {
    telemetry.mark('store write');
    telemetry.mark('total', 900);

    expect(telemetry.toRecord()).toEqual({ 'store write': 1000, total: 900 });
  });

  it('should time async stages and stop on failure', async () => {
    await expect(
      telemetry.measure('execute', async () => {
        now += 2;
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(telemetry.get('execute')).toBe(2);
    expect(telemetry.isRunning('execute')).toBe(false);
  });
});

describe('isWorkerInternal', () => {
  it('should flag parenthesised timer names', () => {
    expect(isWorkerInternal('(pull wait)')).toBe(true);
    expect(isWorkerInternal('commit')).toBe(false);
  });
});
