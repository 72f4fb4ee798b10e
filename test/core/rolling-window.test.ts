import { describe, it, expect } from 'vitest';
import { RollingWindow, DEFAULT_CAPACITY } from '../../src/core/rolling-window.js';
import { ConfigurationError } from '../../src/core/errors.js';
import { createSample } from '../../src/core/sample.js';

const values = (window: RollingWindow) => window.snapshot().map((s) => s.value);

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('RollingWindow', () => {
  it('defaults to 60 samples', () => {
    expect(new RollingWindow().capacity).toBe(DEFAULT_CAPACITY);
    expect(DEFAULT_CAPACITY).toBe(60);
  });

  it('starts empty', () => {
    const window = new RollingWindow(3);
    expect(window.isEmpty()).toBe(true);
    expect(window.size).toBe(0);
    expect(window.latest()).toBeUndefined();
    expect(window.snapshot()).toEqual([]);
  });

  it('keeps samples oldest first', () => {
    const window = new RollingWindow(3);
    window.push(createSample(1, 1000));
    window.push(createSample(2, 2000));

    expect(values(window)).toEqual([1, 2]);
    expect(window.latest()).toEqual({ timestamp: 2000, value: 2 });
  });

  it('evicts the oldest sample once full', () => {
    const window = new RollingWindow(3);
    for (let i = 1; i <= 5; i++) window.push(createSample(i, i));

    expect(values(window)).toEqual([3, 4, 5]);
    expect(window.size).toBe(3);
  });

  it('stays correct across many evictions', () => {
    const window = new RollingWindow(2);
    for (let i = 1; i <= 25; i++) window.push(createSample(i, i));

    expect(values(window)).toEqual([24, 25]);
    expect(window.latest()?.value).toBe(25);
  });

  it('keeps missing samples in place', () => {
    const window = new RollingWindow(3);
    window.push(createSample(1, 1));
    window.push(createSample(null, 2));
    window.push(createSample(3, 3));

    expect(values(window)).toEqual([1, null, 3]);
  });

  it('returns a frozen copy that later pushes do not change', () => {
    const window = new RollingWindow(2);
    window.push(createSample(1, 1));
    const before = window.snapshot();

    window.push(createSample(2, 2));
    window.push(createSample(3, 3));

    expect(Object.isFrozen(before)).toBe(true);
    expect(before.map((s) => s.value)).toEqual([1]);
    expect(values(window)).toEqual([2, 3]);
  });

  it('clears all samples', () => {
    const window = new RollingWindow(2);
    window.push(createSample(1, 1));
    window.clear();

    expect(window.isEmpty()).toBe(true);
    expect(window.snapshot()).toEqual([]);
  });

  it('rejects a capacity that is not a positive integer', () => {
    expect(() => new RollingWindow(0)).toThrow(ConfigurationError);
    expect(() => new RollingWindow(-1)).toThrow('Window capacity must be a positive integer, got -1');
    expect(() => new RollingWindow(1.5)).toThrow(ConfigurationError);
  });

  it('names the capacity key in the error', () => {
    expect(thrown(() => new RollingWindow(0))).toMatchObject({
      name: 'ConfigurationError',
      configKey: 'capacity',
    });
  });
});
