/**
 * appcompat Core: Override Snapshot Fold / Serialize
 *
 * Pure conversions between the persisted ChangeOverrides shape and the two
 * live maps a ChangeState keeps.
 *
 * Load folds three categories, in this order, so that later categories win
 * for a package's raw entry:
 *
 *   1. deferred: legacy; becomes an unconditional raw override
 *   2. validated: goes into the evaluated map AND, for older files that
 *                  carry no raw category, into raw as unconditional
 *   3. raw: version-conditional raw override
 *
 * Every validated package therefore ends up in both maps.
 */

import { PackageOverride } from '../override/package-override.js';
import type {
  ChangeOverrides,
  OverrideValueEntry,
  RawOverrideEntry,
} from '../types/snapshot.js';

export interface FoldedOverrides {
  readonly raw: ReadonlyMap<string, PackageOverride>;
  readonly evaluated: ReadonlyMap<string, boolean>;
}

/**
 * Fold a persisted snapshot into raw and evaluated maps.
 *
 * @throws {IllegalArgumentError} If a raw entry has inverted or non-integer bounds.
 */
export function foldChangeOverrides(snapshot: ChangeOverrides): FoldedOverrides {
  const raw = new Map<string, PackageOverride>();
  const evaluated = new Map<string, boolean>();

  for (const entry of snapshot.deferred ?? []) {
    raw.set(entry.packageName, PackageOverride.unconditional(entry.enabled));
  }

  for (const entry of snapshot.validated ?? []) {
    evaluated.set(entry.packageName, entry.enabled);
    raw.set(entry.packageName, PackageOverride.unconditional(entry.enabled));
  }

  for (const entry of snapshot.raw ?? []) {
    raw.set(
      entry.packageName,
      PackageOverride.builder()
        .setMinVersionCode(entry.minVersionCode)
        .setMaxVersionCode(entry.maxVersionCode)
        .setEnabled(entry.enabled)
        .build(),
    );
  }

  return { raw, evaluated };
}

/**
 * Serialize live maps into a snapshot.
 *
 * Returns null when there are no raw overrides: nothing is persisted for
 * such a change, even if stale evaluated entries remain. Entries are
 * ordered by package name so identical state always serializes identically.
 */
export function serializeChangeOverrides(
  changeId: number,
  raw: ReadonlyMap<string, PackageOverride>,
  evaluated: ReadonlyMap<string, boolean>,
): ChangeOverrides | null {
  if (raw.size === 0) {
    return null;
  }

  const rawEntries: RawOverrideEntry[] = sortedKeys(raw).flatMap((packageName) => {
    const override = raw.get(packageName);
    if (override === undefined) return [];
    return [
      {
        packageName,
        ...(override.minVersionCode !== undefined
          ? { minVersionCode: override.minVersionCode }
          : {}),
        ...(override.maxVersionCode !== undefined
          ? { maxVersionCode: override.maxVersionCode }
          : {}),
        enabled: override.enabled,
      },
    ];
  });

  const validatedEntries: OverrideValueEntry[] = sortedKeys(evaluated).flatMap(
    (packageName) => {
      const enabled = evaluated.get(packageName);
      return enabled === undefined ? [] : [{ packageName, enabled }];
    },
  );

  return { changeId, raw: rawEntries, validated: validatedEntries };
}

function sortedKeys(map: ReadonlyMap<string, unknown>): string[] {
  return Array.from(map.keys()).sort();
}
