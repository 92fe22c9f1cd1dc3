import type { AnimationTarget } from './adapter';
import type { AnimProperty, PropertyValues } from './spec';

/** Where steps read start values from and send interpolated values to. */
export interface PropertySink {
  read<P extends AnimProperty>(
    target: AnimationTarget,
    property: P
  ): PropertyValues[P];
  write<P extends AnimProperty>(
    target: AnimationTarget,
    property: P,
    value: PropertyValues[P]
  ): void;
}

/** Unbatched: every write reaches the target and is flushed immediately. */
export const directSink: PropertySink = {
  read(target, property) {
    return target.get(property);
  },
  write(target, property, value) {
    target.set(property, value);
    target.flush?.();
  },
};

type PendingValues = { [P in AnimProperty]?: PropertyValues[P] };

type PendingTarget = {
  target: AnimationTarget;
  values: PendingValues;
  // dirty properties in first-write order
  dirty: AnimProperty[];
};

function pendingValue<P extends AnimProperty>(
  values: PendingValues,
  property: P
): PropertyValues[P] | undefined {
  return values[property];
}

function applyPending<P extends AnimProperty>(
  entry: PendingTarget,
  property: P
): boolean {
  const value = pendingValue(entry.values, property);
  if (value === undefined) return false;
  entry.target.set(property, value);
  return true;
}

export interface MutationBatch extends PropertySink {
  /**
   * Applies every dirty property once per target, then calls each touched
   * target's `flush()` once. Returns the number of property writes applied.
   */
  flush(): number;
  /** Number of dirty (target, property) pairs waiting for the next flush. */
  pendingCount(): number;
}

/**
 * Write buffer keyed by (target id, property). Repeated writes within a tick
 * collapse to the last value, and `read` sees values that are still pending.
 */
export function createMutationBatch(): MutationBatch {
  const pending = new Map<string, PendingTarget>();

  return {
    read(target, property) {
      const entry = pending.get(target.id);
      const value = entry ? pendingValue(entry.values, property) : undefined;
      return value !== undefined ? value : target.get(property);
    },

    write(target, property, value) {
      let entry = pending.get(target.id);
      if (!entry) {
        entry = { target, values: {}, dirty: [] };
        pending.set(target.id, entry);
      }
      if (!entry.dirty.includes(property)) entry.dirty.push(property);
      entry.values[property] = value;
    },

    flush() {
      let applied = 0;
      for (const entry of pending.values()) {
        for (const property of entry.dirty) {
          if (applyPending(entry, property)) applied++;
        }
        entry.target.flush?.();
      }
      pending.clear();
      return applied;
    },

    pendingCount() {
      let count = 0;
      for (const entry of pending.values()) count += entry.dirty.length;
      return count;
    },
  };
}
