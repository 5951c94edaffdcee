// ============================================================================
// History
// ============================================================================

/**
 * Read side of a store's history: every state a reducer produced, oldest
 * first, including states that were never published.
 *
 * Meant for debugging. Listeners are not called after each reducer, so
 * diffing consecutive history entries does not describe what observers saw.
 */
export interface History<T> extends Iterable<T> {
  readonly enabled: boolean;
  readonly size: number;
  enable(): void;
  disable(): void;
  /** A copy of the recorded states. */
  read(): ReadonlyArray<T>;
  clear(): void;
}

/**
 * Write side, used by the engine alone.
 */
export interface MutableHistory<T> extends History<T> {
  push(state: T): void;
}

export interface HistoryOptions {
  /** Starts recording immediately. Defaults to false. */
  readonly enabled?: boolean;
  /** Keeps only the newest `limit` states. */
  readonly limit?: number;
}

export class RecordingHistory<T> implements MutableHistory<T> {
  private entries: T[] = [];
  private _enabled: boolean;
  private readonly limit: number;

  constructor(options: HistoryOptions = {}) {
    this._enabled = options.enabled ?? false;
    this.limit = options.limit ?? Number.POSITIVE_INFINITY;
    if (this.limit < 1) {
      throw new RangeError(`History limit must be at least 1, got ${this.limit}`);
    }
  }

  get enabled(): boolean {
    return this._enabled;
  }

  get size(): number {
    return this.entries.length;
  }

  enable(): void {
    this._enabled = true;
  }

  disable(): void {
    this._enabled = false;
  }

  push(state: T): void {
    if (!this._enabled) return;
    this.entries.push(state);
    if (this.entries.length > this.limit) {
      this.entries.splice(0, this.entries.length - this.limit);
    }
  }

  read(): ReadonlyArray<T> {
    return this.entries.slice();
  }

  clear(): void {
    this.entries = [];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.read()[Symbol.iterator]();
  }
}
