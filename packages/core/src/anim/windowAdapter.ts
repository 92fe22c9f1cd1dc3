import type { Color } from '../color/color';
import { createTargetAdapter, type TargetHandle } from './registryAdapter';

/** Plain window record as the windowing collaborator exposes it. */
export interface WindowState {
  x: number;
  y: number;
  w: number;
  h: number;
  opacity: number;
  color: Color;
}

export function createWindowTarget(
  id: string,
  state: WindowState,
  opts: { onFlush?: (state: WindowState) => void } = {}
): TargetHandle {
  const { onFlush } = opts;

  return createTargetAdapter(id, {
    flush: onFlush ? () => onFlush(state) : undefined,
  })
    .prop('position', {
      get: () => ({ x: state.x, y: state.y }),
      set: (v) => {
        state.x = v.x;
        state.y = v.y;
      },
    })
    .prop('size', {
      get: () => ({ x: state.w, y: state.h }),
      set: (v) => {
        state.w = v.x;
        state.h = v.y;
      },
    })
    .prop('opacity', {
      get: () => state.opacity,
      set: (v) => {
        state.opacity = v;
      },
    })
    .prop('color', {
      get: () => state.color,
      set: (v) => {
        state.color = v;
      },
    });
}
