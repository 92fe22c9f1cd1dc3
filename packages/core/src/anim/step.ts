import { lerpColor, type Color } from '../color/color';
import { assertDuration } from '../errors';
import { lerpVec2, type Vec2 } from '../math/vec2';
import type { AnimationTarget } from './adapter';
import { directSink, type PropertySink } from './batch';
import { resolveEasing, type EasingInput } from './easing';
import type {
  AnimationSpec,
  AnimationStep,
  AnimProperty,
  PropertyValues,
  StepResult,
  StepState,
} from './spec';

/**
 * Accumulated float time within this many seconds of the duration counts as
 * complete, so ten ticks of 0.1 s finish a 1 s tween.
 */
export const COMPLETION_EPSILON = 1e-9;

type Interpolator<V> = (from: V, to: V, t: number) => V;

function lerpNumber(from: number, to: number, t: number): number {
  return from + (to - from) * t;
}

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
}

const INTERPOLATORS: { [P in AnimProperty]: Interpolator<PropertyValues[P]> } =
  {
    position: lerpVec2,
    size: lerpVec2,
    opacity: lerpNumber,
    color: lerpColor,
  };

// Applied when writing, not when interpolating: only opacity has a valid range,
// position and size keep the overshoot of back/elastic curves.
const WRITE_FILTERS: {
  [P in AnimProperty]: (value: PropertyValues[P]) => PropertyValues[P];
} = {
  position: (v: Vec2) => v,
  size: (v: Vec2) => v,
  opacity: clamp01,
  color: (v: Color) => v,
};

function interpolatorFor<P extends AnimProperty>(
  property: P
): Interpolator<PropertyValues[P]> {
  return INTERPOLATORS[property];
}

function writeFilterFor<P extends AnimProperty>(
  property: P
): (value: PropertyValues[P]) => PropertyValues[P] {
  return WRITE_FILTERS[property];
}

/** Negative and non-finite frame deltas count as zero. */
export function normalizeDelta(dt: number): number {
  return Number.isFinite(dt) && dt > 0 ? dt : 0;
}

/**
 * Validates the duration and resolves the easing before the target is
 * touched, then samples the current value as `from`.
 */
export function createAnimationSpec<P extends AnimProperty>(
  target: AnimationTarget,
  property: P,
  to: PropertyValues[P],
  duration: number,
  easing?: EasingInput,
  sink: PropertySink = directSink
): AnimationSpec<P> {
  assertDuration(duration, 'animateStep()');
  const easingFn = resolveEasing(easing);
  return Object.freeze({
    target,
    property,
    from: sink.read(target, property),
    to,
    duration,
    easing: easingFn,
  });
}

/**
 * Drives one spec. The start value is re-read on the first advance so a
 * step queued behind others in a sequence starts where they left the target.
 */
export function createAnimationStep<P extends AnimProperty>(
  spec: AnimationSpec<P>,
  sink: PropertySink = directSink
): AnimationStep {
  const { target, property, to, duration, easing } = spec;
  const interpolate = interpolatorFor(property);
  const filter = writeFilterFor(property);

  let start = spec.from;
  let elapsed = 0;
  let state: StepState = 'pending';

  return {
    kind: 'tween',
    duration,
    sinks: [sink],

    state() {
      return state;
    },

    advance(dt) {
      if (state === 'complete') return 'done';
      if (state === 'pending') {
        start = sink.read(target, property);
        state = 'running';
      }

      elapsed += normalizeDelta(dt);
      if (elapsed >= duration - COMPLETION_EPSILON) {
        sink.write(target, property, filter(to));
        state = 'complete';
        return 'done';
      }

      const t = clamp01(elapsed / duration);
      sink.write(target, property, filter(interpolate(start, to, easing(t))));
      return 'continue';
    },
  };
}

/** `create(target, property, endValue, duration, easing)` in one call. */
export function animateStep<P extends AnimProperty>(
  target: AnimationTarget,
  property: P,
  endValue: PropertyValues[P],
  duration: number,
  easing?: EasingInput,
  sink: PropertySink = directSink
): AnimationStep {
  const spec = createAnimationSpec(
    target,
    property,
    endValue,
    duration,
    easing,
    sink
  );
  return createAnimationStep(spec, sink);
}

/** Holds a place in a sequence without touching any target. */
export function waitStep(duration: number): AnimationStep {
  assertDuration(duration, 'waitStep()');
  let elapsed = 0;
  let state: StepState = 'pending';

  return {
    kind: 'wait',
    duration,
    sinks: [],

    state() {
      return state;
    },

    advance(dt): StepResult {
      if (state === 'complete') return 'done';
      elapsed += normalizeDelta(dt);
      state = elapsed >= duration - COMPLETION_EPSILON ? 'complete' : 'running';
      return state === 'complete' ? 'done' : 'continue';
    },
  };
}
