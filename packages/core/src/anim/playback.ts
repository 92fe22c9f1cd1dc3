import { parseColor, type ColorLike } from '../color/color';
import { resolveEngineConfig, type EngineConfig } from '../config';
import { setLogLevel } from '../logger';
import { addVec2, vec2 } from '../math/vec2';
import type { AnimationTarget } from './adapter';
import { ChoreographyBuilder } from './animationBuilder';
import {
  createMutationBatch,
  directSink,
  type PropertySink,
} from './batch';
import { createRealtimeClock, type Clock } from './clock';
import { parallel, sequence } from './combinators';
import {
  createDriver,
  noopHost,
  type AnimationHost,
  type DriveReport,
} from './driver';
import {
  resolveEasing,
  type EasingFunction,
  type EasingInput,
} from './easing';
import type {
  AnimationStep,
  AnimProperty,
  PropertyValues,
  StepResult,
} from './spec';
import { animateStep, waitStep } from './step';

export type AnimateOptions = {
  /** Seconds; 0 applies the end value on the first tick. */
  duration?: number;
  easing?: EasingInput;
};

const DEFAULT_FADE_DURATION = 0.5;

export interface EngineOptions {
  clock?: Clock;
  host?: AnimationHost;
  config?: Partial<EngineConfig>;
}

/**
 * Engine bound to one clock, one host and one write sink. Every blocking
 * helper is a step handed to the same driver that `advance` uses manually.
 */
export interface AnimationEngine {
  readonly config: Readonly<EngineConfig>;
  readonly sink: PropertySink;

  ease(name: string): EasingFunction;
  animateStep<P extends AnimProperty>(
    target: AnimationTarget,
    property: P,
    endValue: PropertyValues[P],
    duration: number,
    easing?: EasingInput
  ): AnimationStep;
  animate<P extends AnimProperty>(
    target: AnimationTarget,
    property: P,
    endValue: PropertyValues[P],
    duration: number,
    easing?: EasingInput
  ): DriveReport;
  advance(step: AnimationStep, dt: number): StepResult;
  run(step: AnimationStep): DriveReport;
  parallel(...steps: AnimationStep[]): AnimationStep;
  sequence(...steps: AnimationStep[]): AnimationStep;
  wait(duration: number): AnimationStep;
  choreograph(cb: (builder: ChoreographyBuilder) => unknown): AnimationStep;

  moveStep(
    target: AnimationTarget,
    x: number,
    y: number,
    opts?: AnimateOptions
  ): AnimationStep;
  resizeStep(
    target: AnimationTarget,
    w: number,
    h: number,
    opts?: AnimateOptions
  ): AnimationStep;
  fadeStep(
    target: AnimationTarget,
    opacity: number,
    opts?: AnimateOptions
  ): AnimationStep;
  colorStep(
    target: AnimationTarget,
    color: ColorLike,
    opts?: AnimateOptions
  ): AnimationStep;

  move(
    target: AnimationTarget,
    x: number,
    y: number,
    opts?: AnimateOptions
  ): DriveReport;
  moveBy(
    target: AnimationTarget,
    dx: number,
    dy: number,
    opts?: AnimateOptions
  ): DriveReport;
  moveAll(
    targets: readonly AnimationTarget[],
    x: number,
    y: number,
    opts?: AnimateOptions
  ): DriveReport;
  resize(
    target: AnimationTarget,
    w: number,
    h: number,
    opts?: AnimateOptions
  ): DriveReport;
  resizeBy(
    target: AnimationTarget,
    dw: number,
    dh: number,
    opts?: AnimateOptions
  ): DriveReport;
  fade(
    target: AnimationTarget,
    opacity: number,
    opts?: AnimateOptions
  ): DriveReport;
  fadeIn(target: AnimationTarget, opts?: AnimateOptions): DriveReport;
  fadeOut(target: AnimationTarget, opts?: AnimateOptions): DriveReport;
  colorTo(
    target: AnimationTarget,
    color: ColorLike,
    opts?: AnimateOptions
  ): DriveReport;
  /** Blocks for `duration` seconds while still pumping host events. */
  pause(duration: number): DriveReport;
}

export function createEngine(opts: EngineOptions = {}): AnimationEngine {
  const config = resolveEngineConfig(opts.config);
  if (config.logLevel) setLogLevel(config.logLevel);

  const clock =
    opts.clock ?? createRealtimeClock({ frameRate: config.frameRate });
  const host = opts.host ?? noopHost;
  const sink: PropertySink = config.batchWrites
    ? createMutationBatch()
    : directSink;
  const driver = createDriver({ clock, host });

  const step = <P extends AnimProperty>(
    target: AnimationTarget,
    property: P,
    endValue: PropertyValues[P],
    o: AnimateOptions = {}
  ) =>
    animateStep(target, property, endValue, o.duration ?? 0, o.easing, sink);

  const engine: AnimationEngine = {
    config,
    sink,

    ease(name) {
      return resolveEasing(name);
    },

    animateStep(target, property, endValue, duration, easing) {
      return animateStep(target, property, endValue, duration, easing, sink);
    },

    animate(target, property, endValue, duration, easing) {
      // built before the first tick so an invalid spec never touches the target
      const s = engine.animateStep(
        target,
        property,
        endValue,
        duration,
        easing
      );
      return driver.runBlocking(s);
    },

    advance(s, dt) {
      return driver.runManual(s, dt);
    },

    run(s) {
      return driver.runBlocking(s);
    },

    parallel,
    sequence,

    wait(duration) {
      return waitStep(duration);
    },

    choreograph(cb) {
      const builder = new ChoreographyBuilder(sink);
      cb(builder);
      return builder.build();
    },

    moveStep(target, x, y, o) {
      return step(target, 'position', vec2(x, y), o);
    },

    resizeStep(target, w, h, o) {
      return step(target, 'size', vec2(w, h), o);
    },

    fadeStep(target, opacity, o) {
      return step(target, 'opacity', opacity, o);
    },

    colorStep(target, color, o) {
      return step(target, 'color', parseColor(color), o);
    },

    move(target, x, y, o) {
      return driver.runBlocking(engine.moveStep(target, x, y, o));
    },

    moveBy(target, dx, dy, o) {
      const end = addVec2(sink.read(target, 'position'), vec2(dx, dy));
      return driver.runBlocking(step(target, 'position', end, o));
    },

    moveAll(targets, x, y, o) {
      const steps = targets.map((t) => engine.moveStep(t, x, y, o));
      return driver.runBlocking(parallel(...steps));
    },

    resize(target, w, h, o) {
      return driver.runBlocking(engine.resizeStep(target, w, h, o));
    },

    resizeBy(target, dw, dh, o) {
      const end = addVec2(sink.read(target, 'size'), vec2(dw, dh));
      return driver.runBlocking(step(target, 'size', end, o));
    },

    fade(target, opacity, o) {
      return driver.runBlocking(engine.fadeStep(target, opacity, o));
    },

    fadeIn(target, o = {}) {
      const s = engine.fadeStep(target, 1, {
        ...o,
        duration: o.duration ?? DEFAULT_FADE_DURATION,
      });
      sink.write(target, 'opacity', 0);
      return driver.runBlocking(s);
    },

    fadeOut(target, o = {}) {
      return driver.runBlocking(
        engine.fadeStep(target, 0, {
          ...o,
          duration: o.duration ?? DEFAULT_FADE_DURATION,
        })
      );
    },

    colorTo(target, color, o) {
      return driver.runBlocking(engine.colorStep(target, color, o));
    },

    pause(duration) {
      return driver.runBlocking(waitStep(duration));
    },
  };

  return engine;
}

/**
 * Blocking `animate` for callers without an engine; the clock and host are
 * passed explicitly and writes go straight to the target.
 */
export function animate<P extends AnimProperty>(
  target: AnimationTarget,
  property: P,
  endValue: PropertyValues[P],
  duration: number,
  easing: EasingInput | undefined,
  opts: { clock: Clock; host?: AnimationHost }
): DriveReport {
  const s = animateStep(target, property, endValue, duration, easing);
  return createDriver(opts).runBlocking(s);
}
