/**
 * spanline - Recent Errors
 */

/**
 * One recorded failure.
 */
export interface ErrorItem {
  /** Nanoseconds since the Unix epoch */
  readonly timestampNs: number;
  readonly route: string;
  readonly status: number;
  /** Exception type name, e.g. `TypeError` */
  readonly errorKind: string;
  readonly errorDetail: string;
  readonly stack?: string;
}

/**
 * Fixed-capacity ring of errors; the oldest is overwritten at capacity.
 */
export class ErrorRing {
  private readonly items: Array<ErrorItem | undefined>;
  private next = 0;
  private _size = 0;

  constructor(readonly capacity: number) {
    this.items = new Array<ErrorItem | undefined>(capacity);
  }

  get size(): number {
    return this._size;
  }

  push(item: ErrorItem): void {
    this.items[this.next] = item;
    this.next = (this.next + 1) % this.capacity;
    this._size = Math.min(this._size + 1, this.capacity);
  }

  /**
   * Up to `limit` items, most recent first.
   */
  recent(limit: number = this.capacity): ErrorItem[] {
    const count = Math.min(Math.max(0, limit), this._size);
    const result: ErrorItem[] = [];
    for (let i = 1; i <= count; i++) {
      const item = this.items[(this.next - i + this.capacity) % this.capacity];
      if (item) {
        result.push(item);
      }
    }
    return result;
  }

  clear(): void {
    this.items.fill(undefined);
    this.next = 0;
    this._size = 0;
  }
}
