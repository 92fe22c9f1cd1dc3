import { describe, it, expect, vi, afterEach } from 'vitest';
import { createColor } from '../color/color';
import { isAnimationError } from '../errors';
import { vec2 } from '../math/vec2';
import { createTargetAdapter } from './registryAdapter';
import { createWindowTarget, type WindowState } from './windowAdapter';

describe('anim/registryAdapter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('routes get and set through registered handlers', () => {
    let opacity = 0.3;
    const target = createTargetAdapter('panel').prop('opacity', {
      get: () => opacity,
      set: (v) => {
        opacity = v;
      },
    });

    expect(target.id).toBe('panel');
    expect(target.get('opacity')).toBe(0.3);
    target.set('opacity', 0.9);
    expect(opacity).toBe(0.9);
  });

  it('accepts handlers up front and lets prop() replace them', () => {
    const first = vi.fn(() => vec2(1, 1));
    const second = vi.fn(() => vec2(2, 2));
    const target = createTargetAdapter('t', {
      handlers: { position: { get: first } },
    });

    expect(target.get('position')).toEqual({ x: 1, y: 1 });
    target.prop('position', { get: second });
    expect(target.get('position')).toEqual({ x: 2, y: 2 });
    expect(first).toHaveBeenCalledTimes(1);
  });

  it('reports which properties it can read', () => {
    const target = createTargetAdapter('t').prop('size', {
      get: () => vec2(5, 5),
    });

    expect(target.supports('size')).toBe(true);
    expect(target.supports('color')).toBe(false);
  });

  it('throws UnsupportedProperty when reading without a reader', () => {
    const target = createTargetAdapter('bare');

    let caught: unknown;
    try {
      target.get('color');
    } catch (err) {
      caught = err;
    }

    expect(isAnimationError(caught, 'UnsupportedProperty')).toBe(true);
    expect(caught).toHaveProperty(
      'message',
      'Animation target "bare": property "color" has no reader'
    );
  });

  it('warns and ignores writes without a writer', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const target = createTargetAdapter('ro').prop('opacity', {
      get: () => 1,
    });

    target.set('opacity', 0);

    expect(target.get('opacity')).toBe(1);
    expect(warn).toHaveBeenCalledWith(
      '[choreo] Animation target "ro": property "opacity" has no writer; write ignored'
    );
  });

  it('only exposes flush when one is given', () => {
    const flush = vi.fn();
    expect(createTargetAdapter('a').flush).toBeUndefined();

    const target = createTargetAdapter('b', { flush });
    target.flush?.();
    expect(flush).toHaveBeenCalledTimes(1);
  });
});

describe('anim/windowAdapter', () => {
  function createState(): WindowState {
    return {
      x: 1,
      y: 2,
      w: 30,
      h: 40,
      opacity: 0.5,
      color: createColor(1, 2, 3),
    };
  }

  it('exposes the window record as animatable properties', () => {
    const state = createState();
    const target = createWindowTarget('w', state);

    expect(target.get('position')).toEqual({ x: 1, y: 2 });
    expect(target.get('size')).toEqual({ x: 30, y: 40 });
    expect(target.get('opacity')).toBe(0.5);
    expect(target.get('color')).toEqual({ r: 1, g: 2, b: 3, a: 255 });
  });

  it('writes back into the record and reports flushes', () => {
    const state = createState();
    const onFlush = vi.fn();
    const target = createWindowTarget('w', state, { onFlush });

    target.set('position', vec2(7, 8));
    target.set('size', vec2(9, 10));
    target.flush?.();

    expect(state).toMatchObject({ x: 7, y: 8, w: 9, h: 10 });
    expect(onFlush).toHaveBeenCalledWith(state);
  });
});
