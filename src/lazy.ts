import type { GlobalRegistry } from './registry.js';

/**
 * A stand-in for the value in `name` that reads the slot on every property access, unstubbing it on the first.
 *
 * For handing a global to code that only knows the real type. Methods come back bound to the real value.
 * Primitive values are read through their wrapper object, so a string slot still answers `length` and
 * `toUpperCase`. `then` always reads as `undefined`, even when the real value has one: the view is never
 * treated as a promise by `await`, and awaiting it does not build the real value.
 */
export function lazyloadSlot<Slots, K extends keyof Slots>(registry: GlobalRegistry<Slots>, name: K): Slots[K] {
  return new Proxy(
    {},
    {
      get(_target, prop, _receiver) {
        if (prop === 'then') return undefined;

        const real = registry.resolve(name, String(prop), 3);
        const value: unknown = Reflect.get(Object(real), prop);
        return typeof value === 'function' ? value.bind(real) : value;
      },
      has(_target, prop) {
        const real = registry.resolve(name, 'has', 3);
        return Reflect.has(Object(real), prop);
      },
    },
  ) as Slots[K];
}
