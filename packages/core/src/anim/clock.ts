import { assertFrameRate } from '../config';
import { AnimationError } from '../errors';
import { normalizeDelta } from './step';

/** Supplies the seconds elapsed since the previous tick (always >= 0). */
export interface Clock {
  tick(): number;
}

export function createFixedClock(dt: number): Clock {
  const step = normalizeDelta(dt);
  return { tick: () => step };
}

/**
 * Replays `dts` in order, then keeps returning `fallback` (the last scripted
 * delta when omitted). Lets a blocking run reproduce the exact frame deltas
 * of a manual one.
 */
export function createScriptedClock(
  dts: readonly number[],
  fallback?: number
): Clock {
  const rest = fallback ?? dts[dts.length - 1];
  if (rest === undefined) {
    throw new AnimationError(
      'InvalidConfig',
      'createScriptedClock(): needs at least one delta or a fallback'
    );
  }

  let index = 0;
  return {
    tick() {
      const dt = dts[index] ?? rest;
      index++;
      return normalizeDelta(dt);
    },
  };
}

const sleepCell = new Int32Array(new SharedArrayBuffer(4));

/** Blocks the calling thread; only the blocking driver should end up here. */
export function sleepSync(seconds: number): void {
  if (!(seconds > 0)) return;
  Atomics.wait(sleepCell, 0, 0, seconds * 1000);
}

export interface RealtimeClockOptions {
  /** Ticks are paced to at most this many per second. */
  frameRate?: number;
  /** Monotonic time source in seconds. */
  now?: () => number;
  sleep?: (seconds: number) => void;
}

/**
 * Wall-clock deltas paced to `frameRate`: a tick that arrives early sleeps
 * for the rest of the frame. Time starts when the clock is created.
 */
export function createRealtimeClock(opts: RealtimeClockOptions = {}): Clock {
  const frameRate = opts.frameRate ?? 60;
  assertFrameRate(frameRate, 'createRealtimeClock()');
  const frameInterval = 1 / frameRate;
  const now = opts.now ?? (() => performance.now() / 1000);
  const sleep = opts.sleep ?? sleepSync;

  let last = now();

  return {
    tick() {
      let current = now();
      const remaining = frameInterval - (current - last);
      if (remaining > 0) {
        sleep(remaining);
        current = now();
      }
      const dt = Math.max(0, current - last);
      last = current;
      return dt;
    },
  };
}
