/**
 * StateContext - the handle a state instance uses to talk to its machine.
 * Passed as the first constructor argument: `new State(ctx, ...params)`.
 *
 * Lets a state drive the machine from its constructor or its onEvent()
 * without reaching for a shared global machine. Each instance gets its own
 * context; once the instance's state is left, the context goes inert.
 */

import type { EventMap } from '../types.js';
import type { EventKey, PendingEvent, StateId, StateParams } from './types.js';

/**
 * Minimal machine interface required by StateContext.
 * Prevents circular dependencies between StateContext and StateMachine.
 */
export interface StateContextMachine<Events extends EventMap, TParams extends StateParams> {
  advance(caller: StateId, ...params: TParams): void;
  post<K extends EventKey<Events>>(event: K, payload: Events[K], ...params: TParams): void;
  isActive(state: StateId): boolean;
}

/**
 * Entry of the slot an instance was built (or last resumed) for
 * @internal
 */
export interface StateLease {
  epoch: number;
}

/**
 * Buffered-event access of the state's own slot
 */
export interface StateContextInbox<Events extends EventMap> {
  takeEvent<K extends EventKey<Events>>(kind: K): PendingEvent<Events[K]> | undefined;
  hasEvents(): boolean;
  isCurrent(lease: StateLease): boolean;
}

export class StateContext<Events extends EventMap, TParams extends StateParams> {
  /** Identity of the state this context belongs to */
  readonly state: StateId;

  private readonly machine: StateContextMachine<Events, TParams>;
  private readonly inbox: StateContextInbox<Events>;
  private readonly lease: StateLease;

  /**
   * @internal Created by the state's slot for every instance it constructs
   */
  constructor(
    state: StateId,
    machine: StateContextMachine<Events, TParams>,
    inbox: StateContextInbox<Events>,
    lease: StateLease
  ) {
    this.state = state;
    this.machine = machine;
    this.inbox = inbox;
    this.lease = lease;
  }

  /**
   * Step down voluntarily: go to the next deferred target, else the chain
   * successor. Ignored once this instance's state has been left.
   */
  advance = (...params: TParams): void => {
    if (this.isCurrent()) {
      this.machine.advance(this.state, ...params);
    }
  };

  post = <K extends EventKey<Events>>(event: K, payload: Events[K], ...params: TParams): void => {
    if (this.isCurrent()) {
      this.machine.post(event, payload, ...params);
    }
  };

  /**
   * Remove and return the buffered payload of one event kind.
   * Returns undefined when nothing is buffered, the payload fails its guard,
   * or the state has been left.
   */
  takeEvent = <K extends EventKey<Events>>(kind: K): PendingEvent<Events[K]> | undefined => {
    return this.isCurrent() ? this.inbox.takeEvent(kind) : undefined;
  };

  hasEvents = (): boolean => {
    return this.isCurrent() && this.inbox.hasEvents();
  };

  isActive = (): boolean => {
    return this.isCurrent() && this.machine.isActive(this.state);
  };

  private isCurrent(): boolean {
    return this.inbox.isCurrent(this.lease);
  }
}
