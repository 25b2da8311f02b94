import { QueueOverflowError } from "../errors";
import { Signal } from "../util/promise";
import { Trace } from "../util/trace";
import { Observation } from "./observation";

export interface ObservationQueueOptions {
  /** Name used in diagnostics and counters */
  name?: string;
  /** Maximum number of queued observations (0 = unbounded) */
  maxSize?: number;
}

/**
 * FIFO of observations shared between producers and one consumer.
 *
 * Producers call `add` from their own callbacks; the consumer waits for the
 * head entry with `tryGet`. Every state transition completes inside a single
 * synchronous method, so producers and the consumer never see a partial update.
 */
export class ObservationQueue<T extends Observation> {
  private readonly entries: T[] = [];
  private readonly arrived = new Signal();
  private readonly options: Required<ObservationQueueOptions>;

  constructor(options: ObservationQueueOptions = {}) {
    this.options = {
      name: options.name ?? "observation",
      maxSize: options.maxSize ?? 0
    };
  }

  get name(): string {
    return this.options.name;
  }

  get maxSize(): number {
    return this.options.maxSize;
  }

  /**
   * Appends an observation and wakes any waiting consumer.
   */
  add(observation: T): void {
    if (this.options.maxSize > 0 && this.entries.length >= this.options.maxSize) {
      Trace.warn(`[ObservationQueue] ${this.options.name} queue full, rejecting ${observation.toString()}`);
      throw new QueueOverflowError(this.options.name, this.options.maxSize);
    }
    this.entries.push(observation);
    Trace.counter(`${this.options.name}.queued`, this.entries.length);
    this.arrived.signal();
  }

  /**
   * Waits up to `timeoutMs` for a head entry. When `consume` is true the entry
   * is removed, otherwise it stays in place. A timeout of 0 polls once.
   * Resolves to null when nothing arrives in time.
   */
  async tryGet(timeoutMs: number, consume: boolean): Promise<T | null> {
    const deadline = Date.now() + Math.max(0, timeoutMs);
    while (this.entries.length === 0) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return null;
      }
      await this.arrived.wait(remaining);
    }
    return consume ? this.entries.shift() ?? null : this.entries[0];
  }

  /**
   * Removes the given observation. Returns false if it is no longer queued.
   */
  remove(observation: T): boolean {
    const index = this.entries.indexOf(observation);
    if (index < 0) {
      return false;
    }
    this.entries.splice(index, 1);
    Trace.counter(`${this.options.name}.queued`, this.entries.length);
    return true;
  }

  get count(): number {
    return this.entries.length;
  }

  /**
   * A copy of the queued observations in arrival order, for diagnostics.
   */
  snapshot(): readonly T[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }
}
