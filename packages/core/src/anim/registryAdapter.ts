import { AnimationError } from '../errors';
import { logger } from '../logger';
import type {
  AnimationTarget,
  PropertyHandlerMap,
  PropHandlers,
} from './adapter';
import type { AnimProperty, PropertyValues } from './spec';

export interface TargetHandle extends AnimationTarget {
  /** Register (or replace) the reader/writer for one property. */
  prop<P extends AnimProperty>(
    property: P,
    handlers: PropHandlers<PropertyValues[P]>
  ): TargetHandle;
  supports(property: AnimProperty): boolean;
}

function handlersFor<P extends AnimProperty>(
  map: PropertyHandlerMap,
  property: P
): PropHandlers<PropertyValues[P]> | undefined {
  return map[property];
}

/**
 * Builds a target from per-property handlers so any host object can be
 * animated without implementing `AnimationTarget` itself.
 */
export function createTargetAdapter(
  id: string,
  opts: { handlers?: PropertyHandlerMap; flush?: () => void } = {}
): TargetHandle {
  const handlers: PropertyHandlerMap = { ...opts.handlers };

  const handle: TargetHandle = {
    id,

    prop(property, propHandlers) {
      const slots: { [Q in typeof property]?: PropHandlers<PropertyValues[Q]> } =
        handlers;
      slots[property] = propHandlers;
      return handle;
    },

    supports(property) {
      return handlersFor(handlers, property)?.get !== undefined;
    },

    get(property) {
      const reader = handlersFor(handlers, property)?.get;
      if (!reader) {
        throw new AnimationError(
          'UnsupportedProperty',
          `Animation target "${id}": property "${property}" has no reader`
        );
      }
      return reader();
    },

    set(property, value) {
      const writer = handlersFor(handlers, property)?.set;
      if (!writer) {
        logger.warn(
          `Animation target "${id}": property "${property}" has no writer; write ignored`
        );
        return;
      }
      writer(value);
    },
  };

  if (opts.flush) handle.flush = opts.flush;
  return handle;
}
