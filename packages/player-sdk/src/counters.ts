export type CounterName =
  | 'registrationsSucceeded'
  | 'registrationsFailed'
  | 'gamesJoined'
  | 'allIns'
  | 'folds'
  | 'sessionsCompleted'
  | 'requestsSent'
  | 'requestsSucceeded'
  | 'requestsFailed';

export const COUNTER_NAMES: readonly CounterName[] = [
  'registrationsSucceeded',
  'registrationsFailed',
  'gamesJoined',
  'allIns',
  'folds',
  'sessionsCompleted',
  'requestsSent',
  'requestsSucceeded',
  'requestsFailed',
];

export type CounterSnapshot = Record<CounterName, number>;

/**
 * Fleet-wide outcome counters. Injected into every session and worker.
 * Values only ever grow.
 */
export interface Counters {
  increment(name: CounterName, by?: number): void;
  get(name: CounterName): number;
  snapshot(): CounterSnapshot;
}

/**
 * In-process counters. Sessions share one event loop, so an increment is a
 * single uninterrupted step and needs no further locking.
 */
export class MemoryCounters implements Counters {
  private values = new Map<CounterName, number>();

  increment(name: CounterName, by = 1): void {
    if (!Number.isInteger(by) || by < 1) {
      throw new RangeError(`Counter increment must be a positive integer (got ${by})`);
    }
    this.values.set(name, this.get(name) + by);
  }

  get(name: CounterName): number {
    return this.values.get(name) ?? 0;
  }

  snapshot(): CounterSnapshot {
    return {
      registrationsSucceeded: this.get('registrationsSucceeded'),
      registrationsFailed: this.get('registrationsFailed'),
      gamesJoined: this.get('gamesJoined'),
      allIns: this.get('allIns'),
      folds: this.get('folds'),
      sessionsCompleted: this.get('sessionsCompleted'),
      requestsSent: this.get('requestsSent'),
      requestsSucceeded: this.get('requestsSucceeded'),
      requestsFailed: this.get('requestsFailed'),
    };
  }
}
