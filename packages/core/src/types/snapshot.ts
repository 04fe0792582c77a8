/**
 * appcompat Core: Persisted Override Snapshot Types
 *
 * The shape exchanged with the storage collaborator. One ChangeOverrides
 * per change that has at least one raw override; changes without raw
 * overrides are not persisted at all.
 */

/** A resolved, version-independent override. */
export interface OverrideValueEntry {
  readonly packageName: string;
  readonly enabled: boolean;
}

/** A version-conditional override. Absent bounds are unbounded. */
export interface RawOverrideEntry {
  readonly packageName: string;
  readonly minVersionCode?: number | undefined;
  readonly maxVersionCode?: number | undefined;
  readonly enabled: boolean;
}

export interface ChangeOverrides {
  readonly changeId: number;
  readonly raw?: ReadonlyArray<RawOverrideEntry> | undefined;
  /** Contents of the evaluated cache at save time. */
  readonly validated?: ReadonlyArray<OverrideValueEntry> | undefined;
  /**
   * Legacy category written before overrides were version-aware.
   * Read on load, never written.
   */
  readonly deferred?: ReadonlyArray<OverrideValueEntry> | undefined;
}
