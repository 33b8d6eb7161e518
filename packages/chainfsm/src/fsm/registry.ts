/**
 * Registry & routing tables
 *
 * Slots keyed by state identity, the event -> target state routing table and
 * the chain links between slots. Mutated only during setup; the machine
 * treats registration as single-threaded configuration.
 */

import type { EventMap } from '../types.js';
import { StateSlot, type SlotHost } from './state-slot.js';
import type { ListKind, StateId, StateParams } from './types.js';

export class Registry<Events extends EventMap, TParams extends StateParams> {
  private readonly slots = new Map<StateId, StateSlot<Events, TParams>>();
  private readonly routes = new Map<string, StateId>();
  private readonly arity: number;
  private readonly host: SlotHost<Events, TParams>;

  constructor(arity: number, host: SlotHost<Events, TParams>) {
    this.arity = arity;
    this.host = host;
  }

  /**
   * Get or create the slot of `id`. Registering an existing identity is a no-op.
   */
  register(id: StateId): StateSlot<Events, TParams> {
    let slot = this.slots.get(id);
    if (!slot) {
      slot = new StateSlot<Events, TParams>(id, this.arity, this.host);
      this.slots.set(id, slot);
    }
    return slot;
  }

  /**
   * Link each state to the next one: a -> b -> c.
   * The last state's existing successor is kept, so chains compose.
   */
  bindChain(ids: readonly StateId[]): void {
    let previous: StateSlot<Events, TParams> | undefined;
    for (const id of ids) {
      const slot = this.register(id);
      if (previous) {
        previous.next = id;
      }
      previous = slot;
    }
  }

  /**
   * Route `event` to `target`; the last route registered for an event wins
   */
  bindEvent(event: string, target: StateId): void {
    this.register(target);
    this.routes.set(event, target);
  }

  setList(id: StateId, kind: ListKind, events: readonly string[]): void {
    const list = this.register(id).list(kind);
    for (const event of events) {
      list.add(event);
    }
  }

  lookup(id: StateId): StateSlot<Events, TParams> | undefined {
    return this.slots.get(id);
  }

  /**
   * Target state of an event, if one was registered
   */
  route(event: string): StateId | undefined {
    return this.routes.get(event);
  }

  hasState(id: StateId): boolean {
    return this.slots.has(id);
  }

  hasRoute(event: string): boolean {
    return this.routes.has(event);
  }

  all(): IterableIterator<StateSlot<Events, TParams>> {
    return this.slots.values();
  }

  clearRoutes(): void {
    this.routes.clear();
  }

  clear(): void {
    this.routes.clear();
    this.slots.clear();
  }
}
