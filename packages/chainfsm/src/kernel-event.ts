/**
 * KernelEvent - notification object delivered to kernel listeners
 *
 * Listeners run synchronously in priority order, so stopping propagation
 * is deterministic: every listener after the one that stopped it is skipped.
 */

export class KernelEvent<T = unknown> {
  /**
   * Notification name (e.g. `fsm:enter:clean`)
   */
  readonly name: string;

  /**
   * Notification payload
   */
  readonly data: T;

  /**
   * Emission timestamp (milliseconds since epoch)
   */
  readonly timestamp: number;

  private _propagationStopped = false;

  constructor(name: string, data: T) {
    this.name = name;
    this.data = data;
    this.timestamp = Date.now();
  }

  /**
   * Stop delivery to the remaining listeners
   */
  stopPropagation = (): void => {
    this._propagationStopped = true;
  };

  get isPropagationStopped(): boolean {
    return this._propagationStopped;
  }
}
