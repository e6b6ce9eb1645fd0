/**
 * Time source used by limiters and backends. Returns epoch milliseconds.
 */
export type Clock = () => number;

export const systemClock: Clock = (): number => Date.now();

/**
 * Clock that only moves when told to. Used to drive algorithms and backends
 * deterministically.
 */
export class ManualClock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  /** Bound so it can be passed wherever a `Clock` is expected. */
  readonly now: Clock = (): number => this.current;

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }
}
