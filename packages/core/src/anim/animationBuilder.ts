import { parseColor, type ColorLike } from '../color/color';
import type { Vec2 } from '../math/vec2';
import type { AnimationTarget } from './adapter';
import { directSink, type PropertySink } from './batch';
import { parallel, sequence } from './combinators';
import type { EasingInput } from './easing';
import type { AnimationStep, AnimProperty, PropertyValues } from './spec';
import { animateStep, waitStep } from './step';

export type TweenOptions = {
  duration: number; // seconds
  easing?: EasingInput;
};

/**
 * End values for one `.to(...)` call. Example: `{ position: { x: 10, y: 0 }, opacity: 0.5 }`.
 */
export type AnimatableProps = {
  position?: Vec2;
  size?: Vec2;
  opacity?: number;
  color?: ColorLike;
};

/**
 * Fluent authoring API that compiles to a step tree.
 *
 * - Sequential by default: every `.to(...)` and `.wait(...)` becomes the next
 *   entry of a sequence.
 * - Properties passed to the same `.to(...)` animate in parallel.
 */
export class ChoreographyBuilder {
  private currentTarget: AnimationTarget | null = null;
  private readonly segments: AnimationStep[] = [];

  constructor(private readonly sink: PropertySink = directSink) {}

  /** Select the target that following `.to(...)` calls animate. */
  select(target: AnimationTarget): this {
    this.currentTarget = target;
    return this;
  }

  /** Tween properties on the current target. */
  to(props: AnimatableProps, opts: TweenOptions): this {
    const target = this.currentTarget;
    if (!target) {
      throw new Error(
        'ChoreographyBuilder.to(): no target selected (call select(...) first)'
      );
    }

    const { duration, easing } = opts;
    const tween = <P extends AnimProperty>(
      property: P,
      value: PropertyValues[P]
    ) => animateStep(target, property, value, duration, easing, this.sink);

    const tweens: AnimationStep[] = [];
    if (props.position) tweens.push(tween('position', props.position));
    if (props.size) tweens.push(tween('size', props.size));
    if (props.opacity !== undefined) {
      tweens.push(tween('opacity', props.opacity));
    }
    if (props.color !== undefined) {
      tweens.push(tween('color', parseColor(props.color)));
    }

    const [only] = tweens;
    this.segments.push(
      tweens.length === 1 && only ? only : parallel(...tweens)
    );
    return this;
  }

  /** Hold for `seconds` before the next segment starts. */
  wait(seconds: number): this {
    this.segments.push(waitStep(seconds));
    return this;
  }

  /** Append an already-built step (for instance a `parallel(...)` group). */
  add(step: AnimationStep): this {
    this.segments.push(step);
    return this;
  }

  build(): AnimationStep {
    return sequence(...this.segments);
  }
}

/** Convenience helper for one-off compilation. */
export function buildChoreography(
  cb: (builder: ChoreographyBuilder) => unknown,
  sink?: PropertySink
): AnimationStep {
  const builder = new ChoreographyBuilder(sink);
  cb(builder);
  return builder.build();
}
