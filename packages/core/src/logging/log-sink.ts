/**
 * appcompat Core: Override Log Sink Interface
 *
 * The injection point for override event persistence. The core owns the
 * contract and the OverrideEventLogger; concrete sinks live in
 * @appcompat/runtime-host, so the core never writes to disk.
 */

import type { OverrideEvent } from './override-log.js';

/**
 * Receives override events. append() is called synchronously once a
 * ChangeState mutation has completed, so the change is consistent and open
 * to further calls by then. An error thrown here reaches the caller of that
 * mutation.
 */
export interface OverrideLogSink {
  append(event: OverrideEvent): void;
}
