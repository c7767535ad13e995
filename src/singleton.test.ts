import { afterEach, describe, expect, test } from 'vitest';
import { hasProcessGlobal, processGlobal, releaseProcessGlobal } from './singleton.js';

const NAME = 'singleton-test:value';

describe('processGlobal', () => {
  afterEach(() => {
    releaseProcessGlobal(NAME);
  });

  test('creates once per name', () => {
    let created = 0;
    const first = processGlobal(NAME, () => ({ id: ++created }));
    const second = processGlobal(NAME, () => ({ id: ++created }));

    expect(second).toBe(first);
    expect(created).toBe(1);
    expect(hasProcessGlobal(NAME)).toBe(true);
  });

  test('is shared through globalThis with other copies of the package', () => {
    const value = processGlobal(NAME, () => 'shared');
    const store: unknown = Reflect.get(globalThis, Symbol.for('lazy-globals:process-globals'));

    if (!(store instanceof Map)) throw new Error('expected a Map on globalThis');
    expect(store.get(NAME)).toBe(value);
  });

  test('release lets the value be created again', () => {
    processGlobal(NAME, () => 'old');

    expect(releaseProcessGlobal(NAME)).toBe(true);
    expect(releaseProcessGlobal(NAME)).toBe(false);
    expect(hasProcessGlobal(NAME)).toBe(false);
    expect(processGlobal(NAME, () => 'new')).toBe('new');
  });
});
