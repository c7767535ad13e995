export class LazyGlobalsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Building a real object re-entered a stub too many times.
 *
 * Usually a constructor that (directly or through another global) calls back into the stub it is replacing.
 * Nothing in this package catches it.
 */
export class UnstubLoopError extends LazyGlobalsError {
  constructor(
    public readonly slotName: string,
    public readonly operation: string,
    public readonly caller: string,
  ) {
    super(`Unstub loop detected on call of ${slotName}.${operation} from ${caller}`);
  }
}

export class UnknownSlotError extends LazyGlobalsError {
  constructor(public readonly slotName: string) {
    super(`Global slot "${slotName}" has not been installed`);
  }
}

export class StubStateError extends LazyGlobalsError {
  constructor(
    public readonly slotName: string,
    message: string,
  ) {
    super(`Global slot "${slotName}": ${message}`);
  }
}

export class StubConfigError extends LazyGlobalsError {
  constructor(
    message: string,
    public readonly issues: string[],
    options?: ErrorOptions,
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
  }
}
