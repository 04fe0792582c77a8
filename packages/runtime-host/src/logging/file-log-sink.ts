/**
 * appcompat Runtime Host: File-backed Override Log Sink
 *
 * Implements OverrideLogSink from @appcompat/core by appending one JSONL
 * line per event to `logs/overrides.jsonl` through the injected StateIO.
 * Each line carries a ULID event_id so logs merged from several sources can
 * be deduplicated.
 */

import type { OverrideEvent, OverrideLogSink } from '@appcompat/core';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

/** Log filename within the logs subdirectory. */
export const OVERRIDES_LOG_FILE = 'overrides.jsonl';

export class FileOverrideLogSink implements OverrideLogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly logfilename: string = OVERRIDES_LOG_FILE,
  ) {}

  append(event: OverrideEvent): void {
    const line = JSON.stringify({
      event_id: ulid(),
      timestamp: event.timestamp,
      kind: event.kind,
      changeId: event.changeId,
      packageName: event.packageName,
      enabled: event.enabled,
    });
    this.stateIO.appendLine(this.logfilename, line);
  }
}
