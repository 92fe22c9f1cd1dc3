import { describe, it, expect, vi } from 'vitest';
import { createColor } from '../color/color';
import { isAnimationError } from '../errors';
import { vec2 } from '../math/vec2';
import { createTargetAdapter } from './registryAdapter';
import {
  animateStep,
  createAnimationSpec,
  createAnimationStep,
  waitStep,
} from './step';
import { createWindowTarget, type WindowState } from './windowAdapter';

function createWindow(overrides: Partial<WindowState> = {}) {
  const state: WindowState = {
    x: 0,
    y: 0,
    w: 100,
    h: 50,
    opacity: 1,
    color: createColor(0, 0, 0),
    ...overrides,
  };
  return { state, target: createWindowTarget('win', state) };
}

describe('anim/step', () => {
  it('moves through pending, running and complete', () => {
    const { state, target } = createWindow();
    const step = animateStep(target, 'position', vec2(100, 200), 1);

    expect(step.kind).toBe('tween');
    expect(step.duration).toBe(1);
    expect(step.state()).toBe('pending');

    expect(step.advance(0.25)).toBe('continue');
    expect(step.state()).toBe('running');
    expect(state.x).toBe(25);
    expect(state.y).toBe(50);

    expect(step.advance(0.5)).toBe('continue');
    expect(state.x).toBe(75);

    expect(step.advance(0.25)).toBe('done');
    expect(step.state()).toBe('complete');
    expect({ x: state.x, y: state.y }).toEqual({ x: 100, y: 200 });
  });

  it('reports done exactly once the dt sum crosses the duration', () => {
    const { state, target } = createWindow();
    const step = animateStep(
      target,
      'size',
      vec2(300, 150),
      1,
      'ease_out_cubic'
    );

    const results = [];
    for (let i = 0; i < 10; i++) results.push(step.advance(0.1));

    expect(results.slice(0, 9).every((r) => r === 'continue')).toBe(true);
    expect(results[9]).toBe('done');
    expect(state.w).toBe(300);
    expect(state.h).toBe(150);
  });

  it('lands on the end value exactly even when the last tick overshoots', () => {
    const { state, target } = createWindow({ x: 3, y: 7 });
    const step = animateStep(
      target,
      'position',
      vec2(10.1, 20.3),
      0.3,
      'ease_in_out_sine'
    );
    step.advance(0.2);
    expect(step.advance(0.2)).toBe('done');
    expect(state.x).toBe(10.1);
    expect(state.y).toBe(20.3);
  });

  it('keeps returning done without writing after completion', () => {
    const set = vi.fn();
    const target = createTargetAdapter('t').prop('opacity', {
      get: () => 0,
      set,
    });
    const step = animateStep(target, 'opacity', 1, 0.5);

    step.advance(0.5);
    expect(set).toHaveBeenCalledTimes(1);
    expect(step.advance(1)).toBe('done');
    expect(step.advance(1)).toBe('done');
    expect(set).toHaveBeenCalledTimes(1);
  });

  it('applies a zero-duration spec once on the first advance', () => {
    const set = vi.fn();
    const target = createTargetAdapter('t').prop('position', {
      get: () => vec2(0, 0),
      set,
    });
    const step = animateStep(target, 'position', vec2(5, 6), 0);

    expect(step.advance(0)).toBe('done');
    expect(set).toHaveBeenCalledTimes(1);
    expect(set).toHaveBeenCalledWith({ x: 5, y: 6 });
    step.advance(0.1);
    expect(set).toHaveBeenCalledTimes(1);
  });

  it('rejects negative and non-finite durations before touching the target', () => {
    const get = vi.fn(() => 1);
    const target = createTargetAdapter('t').prop('opacity', { get });

    for (const duration of [-0.1, Number.NaN, Number.POSITIVE_INFINITY]) {
      let caught: unknown;
      try {
        animateStep(target, 'opacity', 0, duration);
      } catch (err) {
        caught = err;
      }
      expect(isAnimationError(caught, 'InvalidDuration')).toBe(true);
    }
    expect(get).not.toHaveBeenCalled();
  });

  it('fails on an unknown easing name at construction', () => {
    const { target } = createWindow();
    expect(() => animateStep(target, 'opacity', 0, 1, 'ease_sideways')).toThrow(
      /unknown easing/
    );
  });

  it('keeps easing overshoot on position but clamps opacity', () => {
    const { state, target } = createWindow({ opacity: 0.5 });
    const move = animateStep(
      target,
      'position',
      vec2(100, 0),
      1,
      'ease_out_back'
    );
    const fade = animateStep(target, 'opacity', 1, 1, 'ease_out_back');

    move.advance(0.8);
    fade.advance(0.8);

    // easeOutBack(0.8) is about 1.0465
    expect(state.x).toBeGreaterThan(100);
    expect(state.opacity).toBe(1);
  });

  it('treats negative and NaN dt as zero', () => {
    const { state, target } = createWindow();
    const step = animateStep(target, 'position', vec2(10, 0), 1);
    expect(step.advance(-5)).toBe('continue');
    expect(step.advance(Number.NaN)).toBe('continue');
    expect(state.x).toBe(0);
    step.advance(0.5);
    expect(state.x).toBe(5);
  });

  it('blends colors through the rounded lerp', () => {
    const { state, target } = createWindow({ color: createColor(0, 0, 0, 0) });
    const step = animateStep(
      target,
      'color',
      createColor(255, 100, 11, 255),
      2
    );

    step.advance(1);
    expect(state.color).toEqual({ r: 128, g: 50, b: 6, a: 128 });
    step.advance(1);
    expect(state.color).toEqual({ r: 255, g: 100, b: 11, a: 255 });
  });

  it('records the spec immutably and re-reads the start on the first advance', () => {
    const { state, target } = createWindow({ x: 10 });
    const spec = createAnimationSpec(target, 'position', vec2(20, 0), 1);
    expect(spec.from).toEqual({ x: 10, y: 0 });
    expect(Object.isFrozen(spec)).toBe(true);

    state.x = 0;
    const step = createAnimationStep(spec);
    step.advance(0.5);
    expect(state.x).toBe(10);
    expect(spec.from).toEqual({ x: 10, y: 0 });
  });

  it('waits without writing', () => {
    const pause = waitStep(0.5);
    expect(pause.kind).toBe('wait');
    expect(pause.state()).toBe('pending');
    expect(pause.advance(0.25)).toBe('continue');
    expect(pause.state()).toBe('running');
    expect(pause.advance(0.25)).toBe('done');
    expect(pause.advance(1)).toBe('done');
    expect(waitStep(0).advance(0)).toBe('done');
    expect(() => waitStep(-1)).toThrow(/duration must be/);
  });
});
