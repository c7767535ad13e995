import { UnknownSlotError } from './errors.js';

/** What a slot needs from a stub: a way to turn itself into the real value */
export interface SlotStub<T> {
  unstub(operation?: string, callerDepth?: number): T;
}

export type SlotCell<T> =
  | { readonly state: 'stub'; readonly stub: SlotStub<T> }
  | { readonly state: 'real'; readonly value: T };

type SlotCells<Slots> = { [K in keyof Slots]?: SlotCell<Slots[K]> };

/**
 * Typed, process-wide bindings. Each slot holds either the stub installed at setup or the real value that
 * replaced it.
 */
export class GlobalRegistry<Slots> {
  private cells: SlotCells<Slots> = {};
  private readonly names = new Set<keyof Slots>();

  /** Put a placeholder in `name`, replacing whatever was there */
  public install<K extends keyof Slots>(name: K, stub: SlotStub<Slots[K]>) {
    this.cells[name] = { state: 'stub', stub };
    this.names.add(name);
  }

  public set<K extends keyof Slots>(name: K, value: Slots[K]) {
    this.cells[name] = { state: 'real', value };
    this.names.add(name);
  }

  public has(name: keyof Slots): boolean {
    return this.cells[name] !== undefined;
  }

  public cell<K extends keyof Slots>(name: K): SlotCell<Slots[K]> {
    const cell = this.cells[name];
    if (cell === undefined) throw new UnknownSlotError(String(name));
    return cell;
  }

  /** Whatever occupies the slot now, stub or not */
  public get<K extends keyof Slots>(name: K): Slots[K] | SlotStub<Slots[K]> {
    const cell = this.cell(name);
    return cell.state === 'real' ? cell.value : cell.stub;
  }

  public isStubbed(name: keyof Slots): boolean {
    return this.cell(name).state === 'stub';
  }

  /** The real value of the slot, unstubbing it first when needed */
  public resolve<K extends keyof Slots>(name: K, operation = 'resolve', callerDepth = 2): Slots[K] {
    const cell = this.cell(name);
    return cell.state === 'real' ? cell.value : cell.stub.unstub(operation, callerDepth);
  }

  public slots(): Array<keyof Slots> {
    return [...this.names];
  }

  public reset(name: keyof Slots): boolean {
    delete this.cells[name];
    return this.names.delete(name);
  }

  public clear() {
    this.cells = {};
    this.names.clear();
  }
}
