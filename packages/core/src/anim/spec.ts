import type { Color } from '../color/color';
import type { Vec2 } from '../math/vec2';
import type { EasingFunction } from './easing';
import type { AnimationTarget } from './adapter';
import type { PropertySink } from './batch';

export interface PropertyValues {
  position: Vec2;
  size: Vec2;
  opacity: number;
  color: Color;
}

export type AnimProperty = keyof PropertyValues;

export const ANIM_PROPERTIES: readonly AnimProperty[] = [
  'position',
  'size',
  'opacity',
  'color',
];

export type StepResult = 'continue' | 'done';

export type StepState = 'pending' | 'running' | 'complete';

export type StepKind = 'tween' | 'wait' | 'parallel' | 'sequence';

/** Immutable description of one tween; durations are seconds. */
export interface AnimationSpec<P extends AnimProperty = AnimProperty> {
  readonly target: AnimationTarget;
  readonly property: P;
  /**
   * Value read when the spec was created. The step re-reads the target on
   * its first advance and starts from that value instead.
   */
  readonly from: PropertyValues[P];
  readonly to: PropertyValues[P];
  readonly duration: number;
  readonly easing: EasingFunction;
}

/**
 * Resumable unit of animation work. Combinators implement the same
 * contract, so drivers treat single tweens and whole trees alike.
 */
export interface AnimationStep {
  readonly kind: StepKind;
  /**
   * Nominal duration in seconds (max of children for parallel, sum for
   * sequence).
   */
  readonly duration: number;
  /** Sinks the step (or any child) writes through, without duplicates. */
  readonly sinks: readonly PropertySink[];
  state(): StepState;
  /** Once this returns `'done'`, later calls are no-ops that keep returning `'done'`. */
  advance(dt: number): StepResult;
}
