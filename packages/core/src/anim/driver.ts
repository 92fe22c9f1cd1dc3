import { logger } from '../logger';
import type { MutationBatch, PropertySink } from './batch';
import type { Clock } from './clock';
import type { AnimationStep, StepResult } from './spec';

/**
 * Event pump of the windowing host. Returning `false` means the host wants
 * to quit (window closed, escape pressed) and the blocking run stops.
 */
export interface AnimationHost {
  pumpEvents(): boolean | void;
}

export const noopHost: AnimationHost = {
  pumpEvents() {
    return true;
  },
};

export type DriverState = 'idle' | 'driving' | 'finished';

export interface DriveReport {
  status: 'done' | 'stopped';
  /** Ticks consumed, including the one that completed the step. */
  frames: number;
  /** Sum of the clock deltas fed to the step, in seconds. */
  elapsed: number;
}

export interface DriverOptions {
  clock: Clock;
  host?: AnimationHost;
}

export interface AnimationDriver {
  state(): DriverState;
  /** Loops until the step is done or the host asks to quit. */
  runBlocking(step: AnimationStep): DriveReport;
  /** One tick for callers that own the frame loop. */
  runManual(step: AnimationStep, dt: number): StepResult;
}

function isBatch(sink: PropertySink): sink is MutationBatch {
  return 'flush' in sink && typeof sink.flush === 'function';
}

/**
 * Advances once, then flushes every batch the step writes through, exactly
 * like one blocking tick.
 */
export function advance(step: AnimationStep, dt: number): StepResult {
  const result = step.advance(dt);
  for (const sink of step.sinks) {
    if (isBatch(sink)) sink.flush();
  }
  return result;
}

export function createDriver(opts: DriverOptions): AnimationDriver {
  const { clock } = opts;
  const host = opts.host ?? noopHost;

  let state: DriverState = 'idle';

  return {
    state() {
      return state;
    },

    runBlocking(step) {
      state = 'driving';
      logger.debug(
        `driver: running ${step.kind} step (nominal ${step.duration}s)`
      );

      let frames = 0;
      let elapsed = 0;
      let status: DriveReport['status'] = 'done';

      for (;;) {
        const dt = clock.tick();
        elapsed += dt;
        frames++;
        const result = advance(step, dt);
        const keepRunning = host.pumpEvents() !== false;
        if (result === 'done') break;
        if (!keepRunning) {
          status = 'stopped';
          logger.warn(
            `driver: host requested stop after ${frames} frame(s); ` +
            `${step.kind} step left unfinished`
          );
          break;
        }
      }

      state = 'finished';
      logger.debug(`driver: ${status} after ${frames} frame(s), ${elapsed}s`);
      return { status, frames, elapsed };
    },

    runManual(step, dt) {
      const result = advance(step, dt);
      state = result === 'done' ? 'finished' : 'driving';
      return result;
    },
  };
}

/** Blocking run with a throwaway driver. */
export function runBlocking(
  step: AnimationStep,
  opts: DriverOptions
): DriveReport {
  return createDriver(opts).runBlocking(step);
}
