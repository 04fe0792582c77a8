/**
 * appcompat Runtime Host: Overrides Store
 *
 * Persists the override snapshots of a set of ChangeStates to a single
 * JSON state file and restores them on startup:
 *
 *   {
 *     "version": 1,
 *     "changes": [ { "changeId": 42, "raw": [...], "validated": [...] }, ... ]
 *   }
 *
 * Changes without raw overrides are omitted. Entries are ordered by change
 * id. The store only moves snapshots between ChangeStates and StateIO; it
 * does not own the set of changes. Callers serialize their own calls to
 * save() and load().
 */

import { z } from 'zod';
import type { ChangeOverrides, ChangeState } from '@appcompat/core';
import type { StateIO } from './state-io.js';

/** Filename for persisted overrides within the state subdirectory. */
export const OVERRIDES_FILE = 'compat-overrides.json';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const versionCodeSchema = z.number().int().safe();

const overrideValueSchema = z.object({
  packageName: z.string().min(1),
  enabled: z.boolean(),
});

const rawOverrideSchema = z
  .object({
    packageName: z.string().min(1),
    minVersionCode: versionCodeSchema.optional(),
    maxVersionCode: versionCodeSchema.optional(),
    enabled: z.boolean(),
  })
  .refine(
    (entry) =>
      entry.minVersionCode === undefined ||
      entry.maxVersionCode === undefined ||
      entry.minVersionCode <= entry.maxVersionCode,
    { message: 'minVersionCode must not be greater than maxVersionCode', path: ['maxVersionCode'] },
  );

export const changeOverridesSchema = z.object({
  changeId: z.number().int(),
  raw: z.array(rawOverrideSchema).optional(),
  validated: z.array(overrideValueSchema).optional(),
  deferred: z.array(overrideValueSchema).optional(),
});

export const overridesFileSchema = z.object({
  version: z.literal(1),
  changes: z.array(changeOverridesSchema),
});

export type OverridesFile = z.infer<typeof overridesFileSchema>;

const EMPTY_OVERRIDES_FILE: OverridesFile = { version: 1, changes: [] };

// ---------------------------------------------------------------------------
// OverridesStore
// ---------------------------------------------------------------------------

export interface OverridesLoadResult {
  /** Ids of changes that received a snapshot, in file order. */
  readonly loaded: ReadonlyArray<number>;
  /** Ids found in the file with no matching ChangeState. Left untouched. */
  readonly unknownChangeIds: ReadonlyArray<number>;
}

export class OverridesStore {
  /**
   * @param stateIO - Where the overrides file lives. FileStateIO in
   *   production, MemoryStateIO in tests.
   * @param filename - State filename; defaults to OVERRIDES_FILE
   */
  constructor(
    private readonly stateIO: StateIO,
    private readonly filename: string = OVERRIDES_FILE,
  ) {}

  /**
   * Read the persisted snapshots without applying them.
   *
   * @throws {PersistedStateError} If the file fails schema validation
   */
  read(): ReadonlyArray<ChangeOverrides> {
    return this.stateIO.readJson(this.filename, overridesFileSchema, EMPTY_OVERRIDES_FILE)
      .changes;
  }

  /**
   * Replace the overrides of the given changes with the persisted ones.
   *
   * Every snapshot is checked against its change before anything is
   * cleared, so a rejected file leaves all changes as they were. Once the
   * check passes, every given change is cleared, so a change absent from
   * the file ends up with no overrides.
   *
   * @throws {PersistedStateError} If the file fails schema validation
   * @throws {IllegalArgumentError} If a snapshot is unusable for its change
   */
  load(changes: Iterable<ChangeState>): OverridesLoadResult {
    const snapshots = this.read();
    const byId = new Map<number, ChangeState>();
    for (const change of changes) {
      byId.set(change.id, change);
    }

    const matched: Array<{ change: ChangeState; snapshot: ChangeOverrides }> = [];
    const unknownChangeIds: number[] = [];
    for (const snapshot of snapshots) {
      const change = byId.get(snapshot.changeId);
      if (change === undefined) {
        unknownChangeIds.push(snapshot.changeId);
        continue;
      }
      change.checkOverrides(snapshot);
      matched.push({ change, snapshot });
    }

    for (const change of byId.values()) {
      change.clearOverrides();
    }
    for (const { change, snapshot } of matched) {
      change.loadOverrides(snapshot);
    }
    return { loaded: matched.map(({ snapshot }) => snapshot.changeId), unknownChangeIds };
  }

  /**
   * Persist the overrides of the given changes, replacing the file.
   *
   * @returns The number of changes written
   */
  save(changes: Iterable<ChangeState>): number {
    const snapshots: ChangeOverrides[] = [];
    for (const change of changes) {
      const snapshot = change.saveOverrides();
      if (snapshot !== null) {
        snapshots.push(snapshot);
      }
    }
    snapshots.sort((a, b) => a.changeId - b.changeId);
    const file: { version: 1; changes: ReadonlyArray<ChangeOverrides> } = {
      version: 1,
      changes: snapshots,
    };
    this.stateIO.writeJson(this.filename, file);
    return snapshots.length;
  }
}
