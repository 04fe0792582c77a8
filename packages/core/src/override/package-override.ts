/**
 * appcompat Core: Package Override
 *
 * An immutable, version-conditional override request for a single package.
 * The override applies to installed version codes in [min, max] (both
 * inclusive); an absent bound is unbounded on that side.
 *
 * Instances are frozen, so a reader that fetched one from a ChangeState map
 * can never observe it half-updated.
 */

import { IllegalArgumentError } from '../errors.js';

/** Result of evaluating an override against a version. */
export enum OverrideValue {
  /** The version is outside the override's range. */
  Undefined = 'Undefined',
  Enabled = 'Enabled',
  Disabled = 'Disabled',
}

export class PackageOverride {
  readonly minVersionCode: number | undefined;
  readonly maxVersionCode: number | undefined;
  readonly enabled: boolean;

  /**
   * Prefer PackageOverride.builder().
   *
   * @throws {IllegalArgumentError} If a bound is not a safe integer, or
   *   min > max.
   */
  constructor(
    minVersionCode: number | undefined,
    maxVersionCode: number | undefined,
    enabled: boolean,
  ) {
    checkVersionCode('minVersionCode', minVersionCode);
    checkVersionCode('maxVersionCode', maxVersionCode);
    if (
      minVersionCode !== undefined &&
      maxVersionCode !== undefined &&
      minVersionCode > maxVersionCode
    ) {
      throw new IllegalArgumentError(
        `minVersionCode (${minVersionCode}) must not be greater than ` +
          `maxVersionCode (${maxVersionCode})`,
      );
    }
    this.minVersionCode = minVersionCode;
    this.maxVersionCode = maxVersionCode;
    this.enabled = enabled;
    Object.freeze(this);
  }

  static builder(): PackageOverrideBuilder {
    return new PackageOverrideBuilder();
  }

  /** Shorthand for an override that applies to every version. */
  static unconditional(enabled: boolean): PackageOverride {
    return new PackageOverrideBuilder().setEnabled(enabled).build();
  }

  /**
   * Evaluate against the installed version code. A version code that is not
   * a safe integer lies in no range.
   */
  evaluate(versionCode: number): OverrideValue {
    if (!Number.isSafeInteger(versionCode)) {
      return OverrideValue.Undefined;
    }
    if (this.minVersionCode !== undefined && versionCode < this.minVersionCode) {
      return OverrideValue.Undefined;
    }
    if (this.maxVersionCode !== undefined && versionCode > this.maxVersionCode) {
      return OverrideValue.Undefined;
    }
    return this.enabled ? OverrideValue.Enabled : OverrideValue.Disabled;
  }

  /**
   * Evaluate without version information. Only an override covering every
   * version has a defined result.
   */
  evaluateForAllVersions(): OverrideValue {
    if (this.minVersionCode === undefined && this.maxVersionCode === undefined) {
      return this.enabled ? OverrideValue.Enabled : OverrideValue.Disabled;
    }
    return OverrideValue.Undefined;
  }

  equals(other: PackageOverride): boolean {
    return (
      this.minVersionCode === other.minVersionCode &&
      this.maxVersionCode === other.maxVersionCode &&
      this.enabled === other.enabled
    );
  }

  toString(): string {
    const min = this.minVersionCode === undefined ? '-∞' : String(this.minVersionCode);
    const max = this.maxVersionCode === undefined ? '∞' : String(this.maxVersionCode);
    return `PackageOverride[${min}-${max}: ${String(this.enabled)}]`;
  }
}

/**
 * Builder for PackageOverride. Defaults: unbounded range, disabled.
 */
export class PackageOverrideBuilder {
  private minVersionCode: number | undefined = undefined;
  private maxVersionCode: number | undefined = undefined;
  private enabled = false;

  /** Inclusive lower bound; undefined clears it. */
  setMinVersionCode(minVersionCode: number | undefined): this {
    this.minVersionCode = minVersionCode;
    return this;
  }

  /** Inclusive upper bound; undefined clears it. */
  setMaxVersionCode(maxVersionCode: number | undefined): this {
    this.maxVersionCode = maxVersionCode;
    return this;
  }

  setEnabled(enabled: boolean): this {
    this.enabled = enabled;
    return this;
  }

  /** @throws {IllegalArgumentError} On invalid bounds. */
  build(): PackageOverride {
    return new PackageOverride(this.minVersionCode, this.maxVersionCode, this.enabled);
  }
}

function checkVersionCode(field: string, value: number | undefined): void {
  if (value !== undefined && !Number.isSafeInteger(value)) {
    throw new IllegalArgumentError(`${field} must be a safe integer, got ${value}`);
  }
}
