/**
 * Process globals live on `globalThis` under a registered symbol, so that two copies of this package loaded into
 * one process (nested node_modules, bundled and unbundled builds) still share a single value per name.
 */
const PROCESS_GLOBALS = Symbol.for('lazy-globals:process-globals');

function processGlobals(): Map<string, unknown> {
  const existing: unknown = Reflect.get(globalThis, PROCESS_GLOBALS);
  if (existing instanceof Map) return existing;

  const created = new Map<string, unknown>();
  Reflect.defineProperty(globalThis, PROCESS_GLOBALS, { value: created, configurable: true });
  return created;
}

/** One value per `name` for the life of the process, created on first request */
export const processGlobal = <T>(name: string, create: () => T): T => {
  const globals = processGlobals();
  if (!globals.has(name)) {
    globals.set(name, create());
  }

  return globals.get(name) as T;
};

export const hasProcessGlobal = (name: string): boolean => processGlobals().has(name);

/** Forget `name`, so the next `processGlobal(name, …)` creates it again */
export const releaseProcessGlobal = (name: string): boolean => processGlobals().delete(name);
