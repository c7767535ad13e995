import type { Constructor } from './types.js';

export const newObject = <T, A extends unknown[]>(type: Constructor<T, A>, args: A): T => new type(...args);
