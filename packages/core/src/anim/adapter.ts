import type { AnimProperty, PropertyValues } from './spec';

export type PropReader<V> = () => V;
export type PropWriter<V> = (value: V) => void;

export interface PropHandlers<V> {
  get?: PropReader<V>;
  set?: PropWriter<V>;
}

export type PropertyHandlerMap = {
  [P in AnimProperty]?: PropHandlers<PropertyValues[P]>;
};

/**
 * The capability a host exposes for each animated object. The engine never
 * owns a target; it only reads start values and writes interpolated ones.
 */
export interface AnimationTarget {
  /** Stable identity used to coalesce batched writes. */
  readonly id: string;
  get<P extends AnimProperty>(property: P): PropertyValues[P];
  set<P extends AnimProperty>(property: P, value: PropertyValues[P]): void;

  // called after set()s for a frame (lets the host push changes to the window system once)
  flush?: () => void;
}
