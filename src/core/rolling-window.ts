import { ConfigurationError } from './errors.js';
import type { MetricSample } from './sample.js';

export const DEFAULT_CAPACITY = 60;

/**
 * Fixed-capacity history of samples for one metric.
 * Oldest sample is evicted first once capacity is exceeded.
 *
 * All operations are synchronous, so a snapshot can never observe a
 * half-applied push on the event loop.
 */
export class RollingWindow {
  private samples: MetricSample[] = [];
  private head = 0;
  readonly capacity: number;

  constructor(capacity: number = DEFAULT_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ConfigurationError(
        `Window capacity must be a positive integer, got ${capacity}`,
        { configKey: 'capacity' }
      );
    }
    this.capacity = capacity;
  }

  /** Append a sample, evicting the oldest one when full */
  push(sample: MetricSample): void {
    this.samples.push(sample);
    if (this.samples.length - this.head > this.capacity) {
      this.head++;
      // Compact once the dead prefix outgrows the live part
      if (this.head >= this.capacity) {
        this.samples = this.samples.slice(this.head);
        this.head = 0;
      }
    }
  }

  /** Current samples, oldest first. The returned array is a frozen copy. */
  snapshot(): readonly MetricSample[] {
    return Object.freeze(this.samples.slice(this.head));
  }

  latest(): MetricSample | undefined {
    if (this.isEmpty()) return undefined;
    return this.samples[this.samples.length - 1];
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  get size(): number {
    return this.samples.length - this.head;
  }

  /** Drop all samples */
  clear(): void {
    this.samples = [];
    this.head = 0;
  }
}
