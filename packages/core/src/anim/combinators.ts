import type { PropertySink } from './batch';
import type { AnimationStep, StepResult, StepState } from './spec';

function collectSinks(steps: readonly AnimationStep[]): PropertySink[] {
  return [...new Set(steps.flatMap((s) => s.sinks))];
}

type ChildSlot = {
  step: AnimationStep;
  last: StepResult | null;
};

/**
 * Runs children side by side with the same `dt`, in insertion order, and
 * finishes when the last of them does. Children that already reported
 * `'done'` are not advanced again.
 *
 * Children writing the same property of the same target are not prevented;
 * the one inserted last wins each tick.
 *
 * An empty group is a valid no-op that reports `'done'` on its first advance.
 */
export function parallel(...steps: AnimationStep[]): AnimationStep {
  const slots: ChildSlot[] = steps.map((step) => ({ step, last: null }));
  const duration = steps.reduce((mx, s) => Math.max(mx, s.duration), 0);
  let state: StepState = 'pending';

  return {
    kind: 'parallel',
    duration,
    sinks: collectSinks(steps),

    state() {
      return state;
    },

    advance(dt) {
      if (state === 'complete') return 'done';

      let allDone = true;
      for (const slot of slots) {
        if (slot.last !== 'done') slot.last = slot.step.advance(dt);
        if (slot.last !== 'done') allDone = false;
      }

      state = allDone ? 'complete' : 'running';
      return allDone ? 'done' : 'continue';
    },
  };
}

/**
 * Runs children one after another. Each tick advances only the current
 * child; when it completes, the rest of that tick's `dt` is dropped and the
 * next child starts on the following tick.
 *
 * The nominal duration is the sum of the children's. With coarse ticks the
 * real completion time can exceed it by up to one tick per child, since each
 * hand-over discards the unused part of a tick.
 *
 * An empty sequence is a valid no-op that reports `'done'` on its first advance.
 */
export function sequence(...steps: AnimationStep[]): AnimationStep {
  const children = [...steps];
  const duration = children.reduce((sum, s) => sum + s.duration, 0);
  let cursor = 0;
  let state: StepState = 'pending';

  return {
    kind: 'sequence',
    duration,
    sinks: collectSinks(children),

    state() {
      return state;
    },

    advance(dt) {
      if (state === 'complete') return 'done';

      const current = children[cursor];
      if (current && current.advance(dt) === 'done') cursor++;

      state = cursor >= children.length ? 'complete' : 'running';
      return state === 'complete' ? 'done' : 'continue';
    },
  };
}
