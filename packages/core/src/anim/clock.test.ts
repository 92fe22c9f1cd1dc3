import { describe, it, expect, vi } from 'vitest';
import { isAnimationError } from '../errors';
import {
  createFixedClock,
  createRealtimeClock,
  createScriptedClock,
} from './clock';

describe('anim/clock', () => {
  it('repeats a fixed delta', () => {
    const clock = createFixedClock(0.5);
    expect([clock.tick(), clock.tick()]).toEqual([0.5, 0.5]);
    expect(createFixedClock(-1).tick()).toBe(0);
  });

  it('replays scripted deltas then falls back', () => {
    const clock = createScriptedClock([0.1, 0.2, -3], 0.25);
    expect([clock.tick(), clock.tick(), clock.tick(), clock.tick()]).toEqual([
      0.1, 0.2, 0, 0.25,
    ]);
  });

  it('keeps repeating the last scripted delta without a fallback', () => {
    const clock = createScriptedClock([0.1, 0.3]);
    expect([clock.tick(), clock.tick(), clock.tick(), clock.tick()]).toEqual([
      0.1, 0.3, 0.3, 0.3,
    ]);
  });

  it('refuses an empty script without a fallback', () => {
    let caught: unknown;
    try {
      createScriptedClock([]);
    } catch (err) {
      caught = err;
    }
    expect(isAnimationError(caught, 'InvalidConfig')).toBe(true);
    expect(createScriptedClock([], 0.5).tick()).toBe(0.5);
  });

  it.each([0, -30, Number.NaN, Number.POSITIVE_INFINITY])(
    'rejects a realtime frame rate of %s',
    (frameRate) => {
      const sleep = vi.fn();
      expect(() =>
        createRealtimeClock({ frameRate, now: () => 0, sleep })
      ).toThrowError(
        `createRealtimeClock(): frameRate must be a finite number > 0 (got ${frameRate})`
      );
      expect(sleep).not.toHaveBeenCalled();
    }
  );

  it('sleeps away the rest of an early frame', () => {
    let time = 10;
    const sleep = vi.fn((seconds: number) => {
      time += seconds;
    });
    const clock = createRealtimeClock({ frameRate: 4, now: () => time, sleep });

    time = 10.05;
    expect(clock.tick()).toBeCloseTo(0.25, 9);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep.mock.calls[0]?.[0]).toBeCloseTo(0.2, 9);
  });

  it('reports late frames as they are without sleeping', () => {
    let time = 0;
    const sleep = vi.fn();
    const clock = createRealtimeClock({
      frameRate: 10,
      now: () => time,
      sleep,
    });

    time = 0.5;
    expect(clock.tick()).toBe(0.5);
    time = 0.75;
    expect(clock.tick()).toBe(0.25);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('measures real time by default', () => {
    const clock = createRealtimeClock({ frameRate: 1000 });
    const dt = clock.tick();
    expect(dt).toBeGreaterThanOrEqual(0);
    expect(dt).toBeLessThan(1);
  });
});
