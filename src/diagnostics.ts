import { EventEmitter } from 'eventemitter3';
import type { Logger } from './types.js';

export interface UnstubEvent {
  slotName: string;
  operation: string;
  caller: string;
  depth: number;
}

export interface DiagnosticsEvents {
  'profile-in': (scope: string) => void;
  'profile-out': (scope: string, elapsedMs: number) => void;
  debug: (message: string) => void;
  unstubbed: (event: UnstubEvent) => void;
}

/**
 * Observational hooks around unstubbing. Nothing recorded here may fail the operation being observed:
 * listener and logger errors are reported to the logger and dropped.
 */
export class Diagnostics {
  public readonly events = new EventEmitter<DiagnosticsEvents>();
  private readonly openScopes = new Map<string, number[]>();

  constructor(
    public readonly name = 'lazy-globals',
    protected readonly logger: Logger = () => {
      /* default no-op logger */
    },
  ) {}

  public profileIn(scope: string) {
    const starts = this.openScopes.get(scope) ?? [];
    starts.push(performance.now());
    this.openScopes.set(scope, starts);
    this.emit('profile-in', scope);
  }

  public profileOut(scope: string) {
    const starts = this.openScopes.get(scope);
    const start = starts?.pop();
    if (starts && starts.length === 0) this.openScopes.delete(scope);
    if (start === undefined) {
      this.log(`profileOut(${scope}) without matching profileIn`);
      return;
    }
    this.emit('profile-out', scope, performance.now() - start);
  }

  public debug(message: string) {
    this.log(message);
    this.emit('debug', message);
  }

  public unstubbed(event: UnstubEvent) {
    this.emit('unstubbed', event);
  }

  /** Scopes entered and not yet left */
  get openScopeCount() {
    let count = 0;
    for (const starts of this.openScopes.values()) count += starts.length;
    return count;
  }

  public reset() {
    this.openScopes.clear();
    this.events.removeAllListeners();
  }

  private emit<E extends EventEmitter.EventNames<DiagnosticsEvents>>(
    event: E,
    ...args: EventEmitter.EventArgs<DiagnosticsEvents, E>
  ) {
    try {
      this.events.emit(event, ...args);
    } catch (err) {
      this.log(`"${event}" listener failed:`, err);
    }
  }

  private log(message: string, ...rest: unknown[]) {
    try {
      this.logger(`LazyGlobals[${this.name}]: ${message}`, ...rest);
    } catch (err) {
      process.emitWarning(`LazyGlobals[${this.name}]: logger failed: ${String(err)}`);
    }
  }
}
