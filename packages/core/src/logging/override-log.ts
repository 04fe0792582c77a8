/**
 * appcompat Core: Override Event Logger
 *
 * The OverrideEventLogger records one OverrideEvent per override mutation a
 * ChangeState performs: raw overrides set or removed, evaluated overrides set
 * or removed, bulk clears and snapshot loads. Queries that do not mutate are
 * not logged.
 *
 * Delivery contract:
 * - A ChangeState queues the events of a mutation and hands them over in one
 *   recordAll() call after the mutation has completed, listener included
 * - Events reach the sink in the order the mutation produced them
 * - Each event is stamped when it is delivered, not when it was queued
 * - A sink error propagates to the caller; events after the failing one in
 *   the same batch are not delivered
 *
 * The sink is optional. Without one, record() and recordAll() are no-ops,
 * which is what tests and embedded callers without persistence get.
 *
 * @example
 * const logger = new OverrideEventLogger(new FileOverrideLogSink(stateIO));
 * const change = new ChangeState({ id: 42 }, { logger });
 */

import type { OverrideLogSink } from './log-sink.js';

export enum OverrideEventKind {
  RawSet = 'raw-set',
  RawRemoved = 'raw-removed',
  EvaluatedSet = 'evaluated-set',
  EvaluatedRemoved = 'evaluated-removed',
  Cleared = 'cleared',
  Loaded = 'loaded',
}

export interface OverrideEvent {
  readonly kind: OverrideEventKind;
  readonly changeId: number;
  /** Absent for Cleared and Loaded. */
  readonly packageName?: string | undefined;
  /** The evaluated value for EvaluatedSet, the requested value for RawSet. */
  readonly enabled?: boolean | undefined;
  /** ISO-8601 timestamp from the logger's clock. */
  readonly timestamp: string;
}

/** Event fields supplied by the caller; the logger adds the timestamp. */
export type OverrideEventInput = Omit<OverrideEvent, 'timestamp'>;

export class OverrideEventLogger {
  /**
   * @param sink - Destination for events; omit for a no-op logger
   * @param clock - Timestamp source; injectable for deterministic tests
   */
  constructor(
    private readonly sink?: OverrideLogSink,
    private readonly clock: () => string = () => new Date().toISOString(),
  ) {}

  /**
   * Stamp one event and pass it to the sink.
   *
   * @param event - Event fields; the timestamp is added here
   */
  record(event: OverrideEventInput): void {
    if (this.sink === undefined) return;
    this.sink.append({ ...event, timestamp: this.clock() });
  }

  /**
   * Deliver a batch of events in order.
   *
   * @param events - Events queued by one mutation; may be empty
   * @throws Whatever the sink throws, leaving the rest of the batch undelivered
   */
  recordAll(events: ReadonlyArray<OverrideEventInput>): void {
    for (const event of events) {
      this.record(event);
    }
  }
}
