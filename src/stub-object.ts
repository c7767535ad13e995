import type { UnstubContext } from './context.js';
import { StubStateError, UnstubLoopError } from './errors.js';
import type { SlotStub } from './registry.js';
import type { Constructor, MethodArgs, MethodName, MethodResult } from './types.js';

declare const stubBrand: unique symbol;

/** Type-level mark carried by every {@link StubObject}; real objects never have it */
export interface StubBrand {
  readonly [stubBrand]: true;
}

/**
 * Placeholder for a global that is expensive to build.
 *
 * The stub sits in a registry slot until something calls through it. That call builds the real object, writes
 * it into the slot and is then applied to the real object. Later calls read the slot and never see the stub;
 * code still holding the stub is redirected the same way, since every call re-reads the slot.
 *
 * Constructors of real objects should stay light. A constructor that calls back into its own stub, directly or
 * through another global, is an unstub loop and fails with {@link UnstubLoopError}. Where a loop cannot be
 * avoided, check {@link isRealObject} before calling.
 *
 * @example
 * ```ts
 * const context = new UnstubContext<{ search: SearchIndex }>();
 * const search = context.stub('search', SearchIndex, '/var/index');
 * search.call('query', 'hello'); // builds SearchIndex, then runs query('hello') on it
 * ```
 */
export class StubObject<Slots, K extends keyof Slots, A extends unknown[] = unknown[]>
  implements SlotStub<Slots[K]>, StubBrand
{
  declare readonly [stubBrand]: true;

  constructor(
    public readonly context: UnstubContext<Slots>,
    public readonly slotName: K,
    public readonly targetType: Constructor<Slots[K], A> | null,
    public readonly constructorArgs: A,
  ) {}

  public install(): this {
    this.context.registry.install(this.slotName, this);
    return this;
  }

  /** Run `name(...args)` on the real object, building it first if the slot still holds a stub */
  public call<M extends MethodName<Slots[K]>>(name: M, ...args: MethodArgs<Slots[K], M>): MethodResult<Slots[K], M> {
    return this.dispatch(name, args, 3);
  }

  /** For explicit forwarding methods on subclasses; attributes the unstub to whoever called that method */
  protected forward<M extends MethodName<Slots[K]>>(
    name: M,
    args: MethodArgs<Slots[K], M>,
  ): MethodResult<Slots[K], M> {
    return this.dispatch(name, args, 4);
  }

  private dispatch<M extends MethodName<Slots[K]>>(
    name: M,
    args: MethodArgs<Slots[K], M>,
    callerDepth: number,
  ): MethodResult<Slots[K], M> {
    this.unstub(String(name), callerDepth);

    // the slot, not the unstub result: a nested unstub may have replaced it since
    const cell = this.context.registry.cell(this.slotName);
    if (cell.state !== 'real') throw new StubStateError(this.label, 'still stubbed after unstubbing');

    const real = cell.value;
    if (typeof real !== 'object' || real === null) {
      throw new TypeError(`Cannot call ${this.label}.${String(name)}: value is ${real === null ? 'null' : typeof real}`);
    }
    const method: unknown = Reflect.get(real, name);
    if (typeof method !== 'function') {
      throw new TypeError(`${this.label}.${String(name)} is not a function`);
    }
    return Reflect.apply(method, real, args);
  }

  /**
   * Replace this stub in its slot with the real object and return it. Returns the slot's value straight away
   * when that is already real.
   *
   * @param operation what triggered the unstub, for the debug trace
   * @param callerDepth frames between this method and the code to blame in the trace; 1 is the direct caller
   * @throws UnstubLoopError when too many unstubs are already in flight
   */
  public unstub(operation = 'unstub', callerDepth = 1): Slots[K] {
    const { registry, guard, diagnostics } = this.context;

    const cell = registry.cell(this.slotName);
    if (cell.state === 'real') return cell.value;

    const scopeName = `unstub-${this.label}`;
    diagnostics.profileIn(scopeName);
    try {
      const caller = this.context.describeCaller(callerDepth);
      const scope = guard.tryEnter();
      if (scope === null) throw new UnstubLoopError(this.label, operation, caller);

      try {
        diagnostics.debug(`Unstubbing ${this.label} on call of ${this.label}.${operation} from ${caller}`);
        const real = this.buildRealObject();
        registry.set(this.slotName, real);
        diagnostics.unstubbed({ slotName: this.label, operation, caller, depth: scope.depth });
        return real;
      } finally {
        scope.release();
      }
    } finally {
      diagnostics.profileOut(scopeName);
    }
  }

  /** How the real object is made; subclasses that ignore `targetType` override this */
  protected buildRealObject(): Slots[K] {
    if (this.targetType === null) {
      throw new StubStateError(this.label, 'no target type to construct');
    }
    return this.context.construct(this.targetType, this.constructorArgs);
  }

  protected get label() {
    return String(this.slotName);
  }
}

/** False only for stubs. Check before calling through a global that may still be mid-construction */
export function isRealObject<T>(value: T): value is Exclude<T, StubBrand> {
  return !(value instanceof StubObject);
}

/** Build the real object behind `value` now, if it is a stub */
export function forceUnstub(value: unknown): void {
  if (value instanceof StubObject) {
    value.unstub('unstub', 2);
  }
}
