import { describeCaller } from './caller.js';
import { newObject } from './construct.js';
import { Diagnostics } from './diagnostics.js';
import { GlobalRegistry } from './registry.js';
import { StubObject } from './stub-object.js';
import type { CallerDescriber, Construct, Constructor, Logger } from './types.js';
import { UnstubGuard } from './unstub-guard.js';

export interface UnstubContextOptions {
  name?: string;
  /** Nested unstub attempts allowed in flight before failing with UnstubLoopError */
  maxUnstubDepth?: number;
  logger?: Logger;
  construct?: Construct;
  describeCaller?: CallerDescriber;
}

/**
 * Everything a stub works against: the slots it replaces itself in, the recursion guard shared by all of them,
 * and the collaborators used to build and report.
 */
export class UnstubContext<Slots> {
  public readonly registry = new GlobalRegistry<Slots>();
  public readonly guard: UnstubGuard;
  public readonly diagnostics: Diagnostics;
  public readonly construct: Construct;
  public readonly describeCaller: CallerDescriber;

  constructor(options: UnstubContextOptions = {}) {
    this.guard = new UnstubGuard(options.maxUnstubDepth);
    this.diagnostics = new Diagnostics(options.name, options.logger);
    this.construct = options.construct ?? newObject;
    this.describeCaller = options.describeCaller ?? describeCaller;
  }

  /** Create a stub for `name` and install it */
  public stub<K extends keyof Slots, A extends unknown[]>(
    name: K,
    targetType: Constructor<Slots[K], A>,
    ...constructorArgs: A
  ): StubObject<Slots, K, A> {
    return new StubObject(this, name, targetType, constructorArgs).install();
  }

  /** Drop every slot and listener; stubs still referencing this context see UnknownSlotError afterwards */
  public teardown() {
    this.registry.clear();
    this.diagnostics.reset();
  }
}
