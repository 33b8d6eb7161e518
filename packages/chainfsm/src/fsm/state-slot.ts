/**
 * State Slot
 *
 * Owns at most one live instance of a state, the state's interruption lists,
 * its chain successor and its buffered events (one per event kind).
 *
 * Every enter() and leave() bumps the slot epoch. A constructor may call
 * back into the machine and cause its own slot to be left before it
 * returns; the epoch tells enter() that the instance it just built is stale.
 * Each instance holds a lease on the epoch it was entered with, so its
 * context stops driving the machine once the slot moves on.
 */

import type { EventMap } from '../types.js';
import {
  StateContext,
  type StateContextInbox,
  type StateContextMachine,
  type StateLease,
} from './state-context.js';
import {
  ArityMismatchError,
  hasEventHandler,
  isDisposable,
  type EventGuards,
  type EventKey,
  type InterruptionLists,
  type LifecyclePhase,
  type ListKind,
  type PendingEvent,
  type PendingEvents,
  type StateConstructor,
  type StateId,
  type StateParams,
} from './types.js';

/**
 * Services a slot needs from its machine
 * @internal
 */
export interface SlotHost<Events extends EventMap, TParams extends StateParams>
  extends StateContextMachine<Events, TParams> {
  readonly eventGuards: EventGuards<Events>;

  /** Run application code behind the machine's error boundary */
  runStateCode<T>(state: StateId, phase: LifecyclePhase, fn: () => T): T | undefined;

  reportError(error: Error): void;

  trace(message: string, details: Record<string, unknown>): void;
}

interface BuiltState {
  instance: object;
  lease: StateLease;
}

const emptyBuffer = <Events extends EventMap>(): PendingEvents<Events> => Object.create(null);

export class StateSlot<Events extends EventMap, TParams extends StateParams>
  implements InterruptionLists, StateContextInbox<Events>
{
  readonly id: StateId;
  readonly arity: number;
  readonly whitelist = new Set<string>();
  readonly blacklist = new Set<string>();
  readonly deferlist = new Set<string>();

  /** Keep the instance alive across leave()/enter() */
  reuse = false;

  /** Chain successor used by a voluntary step-down */
  next: StateId | undefined;

  private stateClass: StateConstructor<Events, TParams> | undefined;
  private instance: object | undefined;
  private lease: StateLease | undefined;
  private pending: PendingEvents<Events> = emptyBuffer();
  private epoch = 0;
  private readonly host: SlotHost<Events, TParams>;

  constructor(id: StateId, arity: number, host: SlotHost<Events, TParams>) {
    this.id = id;
    this.arity = arity;
    this.host = host;
  }

  /**
   * Attach the state class. A slot keeps the first class it was given.
   * @returns true when the class was attached
   */
  bind(stateClass: StateConstructor<Events, TParams>): boolean {
    if (this.stateClass) {
      return false;
    }
    this.stateClass = stateClass;
    return true;
  }

  hasStateClass(): boolean {
    return this.stateClass !== undefined;
  }

  list(kind: ListKind): Set<string> {
    switch (kind) {
      case 'whitelist':
        return this.whitelist;
      case 'blacklist':
        return this.blacklist;
      case 'deferlist':
        return this.deferlist;
    }
  }

  getInstance(): object | undefined {
    return this.instance;
  }

  /**
   * Build (or reuse) the instance, then deliver events buffered before entry
   */
  enter(params: TParams): void {
    if (this.instance && !this.reuse) {
      this.leave();
    }

    const epoch = ++this.epoch;

    if (this.instance) {
      // Reused instance resumes
      if (this.lease) {
        this.lease.epoch = epoch;
      }
    } else {
      const built = this.construct(params, epoch);
      if (!built) {
        return;
      }
      if (epoch !== this.epoch) {
        // Left while the constructor was running
        const kept = this.reuse && !this.instance;
        if (kept) {
          this.adopt(built);
        } else {
          this.destroy(built.instance);
        }
        this.host.trace('Stale construction discarded', { state: this.id, kept });
        return;
      }
      this.adopt(built);
    }

    if (this.hasEvents()) {
      this.dispatchEvent();
    }
  }

  /**
   * Drop buffered events; destroy the instance unless reuse is set
   */
  leave(): void {
    this.epoch++;
    this.clearEvents();
    if (this.reuse) {
      return;
    }
    this.release();
  }

  /**
   * Hand buffered events to the instance.
   * Without an onEvent() capability the buffer is discarded; while the
   * instance is still being constructed the buffer is kept for enter().
   */
  dispatchEvent(): void {
    const instance = this.instance;
    if (!instance) {
      return;
    }
    if (hasEventHandler(instance)) {
      this.host.runStateCode(this.id, 'event', () => instance.onEvent());
    } else {
      this.clearEvents();
    }
  }

  /**
   * Buffer a payload; a newer payload of the same kind replaces the older one
   */
  bufferEvent<K extends EventKey<Events>>(kind: K, payload: Events[K]): void {
    this.pending[kind] = { name: kind, data: payload, postedAt: Date.now() };
  }

  takeEvent<K extends EventKey<Events>>(kind: K): PendingEvent<Events[K]> | undefined {
    const event = this.pending[kind];
    if (!event) {
      return undefined;
    }
    const guard = this.host.eventGuards[kind];
    if (guard && !guard(event.data)) {
      this.host.trace('Buffered payload failed its guard', { state: this.id, event: kind });
      return undefined;
    }
    delete this.pending[kind];
    return event;
  }

  hasEvents(): boolean {
    return Object.keys(this.pending).length > 0;
  }

  pendingKinds(): string[] {
    return Object.keys(this.pending);
  }

  /**
   * Destroy the instance regardless of reuse. Used by machine teardown.
   */
  teardown(): void {
    this.epoch++;
    this.clearEvents();
    this.release();
  }

  /**
   * Whether an instance's lease still matches the slot's current entry
   */
  isCurrent(lease: StateLease): boolean {
    return lease.epoch === this.epoch;
  }

  private construct(params: TParams, epoch: number): BuiltState | undefined {
    const StateClass = this.stateClass;
    if (!StateClass) {
      this.host.trace('No state class bound, nothing constructed', { state: this.id });
      return undefined;
    }
    if (params.length !== this.arity) {
      this.host.reportError(new ArityMismatchError(this.id, this.arity, params.length));
      return undefined;
    }
    const lease: StateLease = { epoch };
    const context = new StateContext(this.id, this.host, this, lease);
    const instance = this.host.runStateCode(this.id, 'construct', () => new StateClass(context, ...params));
    return instance ? { instance, lease } : undefined;
  }

  private adopt(built: BuiltState): void {
    this.instance = built.instance;
    this.lease = built.lease;
  }

  private release(): void {
    const instance = this.instance;
    this.instance = undefined;
    this.lease = undefined;
    if (instance) {
      this.destroy(instance);
    }
  }

  private destroy(instance: object): void {
    if (isDisposable(instance)) {
      this.host.runStateCode(this.id, 'dispose', () => instance.dispose());
    }
  }

  private clearEvents(): void {
    this.pending = emptyBuffer();
  }
}
