/**
 * appcompat Core: ChangeState
 *
 * The state of a single compatibility change: its static default policy plus
 * per-package overrides and the reconciliation between them.
 *
 * Default policy:
 *   - disabled                  → off for every package
 *   - enableSinceTargetSdk = S  → on iff min(app targetSdk, platform targetSdk) >= S
 *   - otherwise                 → on
 *
 * Overrides are kept in two maps:
 *
 *   rawOverrides        package → PackageOverride (version-conditional intent;
 *                       the source of truth, persisted)
 *   evaluatedOverrides  package → boolean (resolved against the installed
 *                       version; the only map isEnabled() consults)
 *
 * A raw override is recorded as soon as it is requested, possibly before the
 * package is installed. recheck() promotes it into the evaluated map once a
 * version code is known and the allow-list verdict is Allowed, and demotes it
 * again when the version falls out of range or the verdict changes.
 *
 * Concurrency: every operation is synchronous, so on a single event loop
 * no two operations interleave and readers never see a partially applied
 * write. Mutations run inside a per-instance serialization scope. The
 * listener is called synchronously inside that scope, after the evaluated
 * map has been updated; it may read this ChangeState, but any mutating call
 * it makes on the same instance throws IllegalStateError.
 *
 * Override events are queued while a mutation runs and handed to the logger
 * only after both maps are consistent and the listener has returned. A sink
 * that throws never leaves a mutation half-applied; its error
 * reaches the caller of the already-completed operation.
 */

import { IllegalArgumentError, IllegalStateError } from '../errors.js';
import { OverrideEventKind, OverrideEventLogger } from '../logging/override-log.js';
import type { OverrideEventInput } from '../logging/override-log.js';
import type { OverrideAllowedState } from '../override/allowed-state.js';
import { OverrideValue } from '../override/package-override.js';
import type { PackageOverride } from '../override/package-override.js';
import type { ApplicationInfo, BuildInfo } from '../types/app.js';
import { NO_SDK_GATE } from '../types/change.js';
import type { ChangeDefinition, ChangeInfo, ChangeListener } from '../types/change.js';
import type { ChangeOverrides } from '../types/snapshot.js';
import { foldChangeOverrides, serializeChangeOverrides } from './overrides-snapshot.js';
import type { FoldedOverrides } from './overrides-snapshot.js';

export interface ChangeStateOptions {
  /** Receives one event per override mutation. Defaults to a no-op logger. */
  readonly logger?: OverrideEventLogger | undefined;
}

export class ChangeState {
  readonly id: number;
  readonly name: string | null;
  /** Normalised SDK gate; NO_SDK_GATE when ungated. */
  readonly enableSinceTargetSdk: number;
  readonly disabled: boolean;
  readonly loggingOnly: boolean;
  readonly description: string | null;
  /** Advisory; consumed by the external allow-list policy, not enforced here. */
  readonly overridable: boolean;

  private readonly evaluatedOverrides = new Map<string, boolean>();
  private readonly rawOverrides = new Map<string, PackageOverride>();
  private readonly logger: OverrideEventLogger;
  private listener: ChangeListener | null = null;
  private mutating = false;
  /** Events of the mutation in progress; handed to the logger once it completes. */
  private pendingEvents: OverrideEventInput[] = [];

  /**
   * @param definition - Static definition of the change
   * @param options - Optional logger
   * @throws {IllegalArgumentError} If the id is not a safe integer
   */
  constructor(definition: ChangeDefinition, options: ChangeStateOptions = {}) {
    if (!Number.isSafeInteger(definition.id)) {
      throw new IllegalArgumentError(`Change id must be a safe integer, got ${definition.id}`);
    }
    this.id = definition.id;
    this.name = definition.name ?? null;
    this.enableSinceTargetSdk = normaliseSdkGate(definition);
    this.disabled = definition.disabled ?? false;
    this.loggingOnly = definition.loggingOnly ?? false;
    this.description = definition.description ?? null;
    this.overridable = definition.overridable ?? false;
    this.logger = options.logger ?? new OverrideEventLogger();
  }

  // -------------------------------------------------------------------------
  // Listener
  // -------------------------------------------------------------------------

  /**
   * Register the single listener for this change.
   *
   * @throws {IllegalStateError} If a listener is already registered
   */
  registerListener(listener: ChangeListener): void {
    this.serialized(() => {
      if (this.listener !== null) {
        throw new IllegalStateError(`Listener for change ${this.toString()} already registered.`);
      }
      this.listener = listener;
    });
  }

  // -------------------------------------------------------------------------
  // Override mutation
  // -------------------------------------------------------------------------

  /**
   * Tentatively set the override for a package. The raw entry is stored
   * unconditionally; whether it takes effect is decided by recheck().
   *
   * @param packageName - Package to override
   * @param override - Version-conditional override, replacing any previous one
   * @param allowedState - Allow-list verdict for this package
   * @param installedVersionCode - Installed version, or absent if not installed
   * @throws {IllegalArgumentError} If this is a logging-only change
   */
  setRawOverride(
    packageName: string,
    override: PackageOverride,
    allowedState: OverrideAllowedState,
    installedVersionCode?: number | null,
  ): void {
    this.serialized(() => {
      this.checkOverridesPermitted();
      this.rawOverrides.set(packageName, override);
      this.emit({
        kind: OverrideEventKind.RawSet,
        changeId: this.id,
        packageName,
        enabled: override.enabled,
      });
      this.recheckInScope(packageName, allowedState, installedVersionCode);
    });
  }

  /**
   * Reconcile the evaluated override for a package with its raw override,
   * the allow-list verdict and the installed version.
   *
   * Returns true whenever an applicable raw override was evaluated, even if
   * the outcome was removing an entry that did not exist. Callers treat
   * true as "invalidate dependent caches".
   *
   * @param packageName - Package to reconcile; empty or absent is a no-op
   * @param allowedState - Allow-list verdict for this package
   * @param installedVersionCode - Installed version, or absent if not installed
   */
  recheck(
    packageName: string | null | undefined,
    allowedState: OverrideAllowedState,
    installedVersionCode?: number | null,
  ): boolean {
    return this.serialized(() =>
      this.recheckInScope(packageName, allowedState, installedVersionCode),
    );
  }

  /**
   * Remove the raw override for a package and reconcile its evaluated entry.
   *
   * @returns false if the package had no raw override, true otherwise
   * @throws {OverrideNotAllowedError} If the allow-list verdict forbids the change
   */
  removeRawOverride(
    packageName: string,
    allowedState: OverrideAllowedState,
    installedVersionCode?: number | null,
  ): boolean {
    return this.serialized(() => {
      if (!this.rawOverrides.has(packageName)) {
        return false;
      }
      allowedState.enforce(this.id, packageName);
      this.rawOverrides.delete(packageName);
      this.emit({ kind: OverrideEventKind.RawRemoved, changeId: this.id, packageName });
      this.recheckInScope(packageName, allowedState, installedVersionCode);
      return true;
    });
  }

  /** Drop every override. The listener is not notified. */
  clearOverrides(): void {
    this.serialized(() => {
      this.rawOverrides.clear();
      this.evaluatedOverrides.clear();
      this.emit({ kind: OverrideEventKind.Cleared, changeId: this.id });
    });
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /**
   * Whether the change is enabled for an installed application. Consults
   * only the evaluated overrides and the default policy.
   */
  isEnabled(app: ApplicationInfo | null | undefined, build: BuildInfo): boolean {
    if (app === null || app === undefined) {
      return this.defaultValue();
    }
    if (app.packageName !== null && app.packageName !== undefined) {
      const enabled = this.evaluatedOverrides.get(app.packageName);
      if (enabled !== undefined) {
        return enabled;
      }
    }
    if (this.disabled) {
      return false;
    }
    if (this.enableSinceTargetSdk !== NO_SDK_GATE) {
      // Never judge an app against a gate newer than the platform itself.
      const compareSdk = Math.min(app.targetSdkVersion, build.platformTargetSdk);
      return compareSdk >= this.enableSinceTargetSdk;
    }
    return true;
  }

  /**
   * Whether the change will be enabled for a package once it is installed,
   * judged from its raw override alone. Only an override covering every
   * version decides; otherwise the default applies.
   */
  willBeEnabled(packageName: string | null | undefined): boolean {
    if (packageName === null || packageName === undefined) {
      return this.defaultValue();
    }
    const override = this.rawOverrides.get(packageName);
    if (override !== undefined) {
      switch (override.evaluateForAllVersions()) {
        case OverrideValue.Enabled:
          return true;
        case OverrideValue.Disabled:
          return false;
        case OverrideValue.Undefined:
          return this.defaultValue();
      }
    }
    return this.defaultValue();
  }

  /** The value for a package with no override: false iff disabled. */
  defaultValue(): boolean {
    return !this.disabled;
  }

  getRawOverride(packageName: string): PackageOverride | undefined {
    return this.rawOverrides.get(packageName);
  }

  getEvaluatedOverride(packageName: string): boolean | undefined {
    return this.evaluatedOverrides.get(packageName);
  }

  /** A copy of the raw overrides. */
  getRawOverrides(): ReadonlyMap<string, PackageOverride> {
    return new Map(this.rawOverrides);
  }

  /** A copy of the evaluated overrides. */
  getEvaluatedOverrides(): ReadonlyMap<string, boolean> {
    return new Map(this.evaluatedOverrides);
  }

  hasOverrides(): boolean {
    return this.rawOverrides.size > 0 || this.evaluatedOverrides.size > 0;
  }

  describe(): ChangeInfo {
    return {
      id: this.id,
      name: this.name,
      enableSinceTargetSdk: this.enableSinceTargetSdk,
      disabled: this.disabled,
      loggingOnly: this.loggingOnly,
      description: this.description,
      overridable: this.overridable,
    };
  }

  // -------------------------------------------------------------------------
  // Persistence
  // -------------------------------------------------------------------------

  /**
   * Merge a persisted snapshot into the live maps. Packages not mentioned
   * in the snapshot keep their current entries. No notifications are sent.
   *
   * @throws {IllegalArgumentError} If the snapshot belongs to another change,
   *   carries entries for a logging-only change, or holds an invalid range
   */
  loadOverrides(snapshot: ChangeOverrides): void {
    this.serialized(() => {
      const folded = this.foldForLoad(snapshot);
      if (folded.raw.size === 0 && folded.evaluated.size === 0) {
        return;
      }
      for (const [packageName, override] of folded.raw) {
        this.rawOverrides.set(packageName, override);
      }
      for (const [packageName, enabled] of folded.evaluated) {
        this.evaluatedOverrides.set(packageName, enabled);
      }
      this.emit({ kind: OverrideEventKind.Loaded, changeId: this.id });
    });
  }

  /**
   * Check that loadOverrides() would accept a snapshot, without touching
   * any state. Lets a caller vet a whole batch before clearing anything.
   *
   * @throws {IllegalArgumentError} On the same conditions as loadOverrides()
   */
  checkOverrides(snapshot: ChangeOverrides): void {
    this.foldForLoad(snapshot);
  }

  /**
   * Snapshot the current overrides for persistence.
   *
   * @returns null when there are no raw overrides to persist
   */
  saveOverrides(): ChangeOverrides | null {
    return serializeChangeOverrides(this.id, this.rawOverrides, this.evaluatedOverrides);
  }

  toString(): string {
    let out = `ChangeId(${this.id}`;
    if (this.name !== null) {
      out += `; name=${this.name}`;
    }
    if (this.enableSinceTargetSdk !== NO_SDK_GATE) {
      out += `; enableSinceTargetSdk=${this.enableSinceTargetSdk}`;
    }
    if (this.disabled) {
      out += '; disabled';
    }
    if (this.loggingOnly) {
      out += '; loggingOnly';
    }
    if (this.evaluatedOverrides.size > 0) {
      out += `; packageOverrides=${formatMap(this.evaluatedOverrides)}`;
    }
    if (this.rawOverrides.size > 0) {
      out += `; rawOverrides=${formatMap(this.rawOverrides)}`;
    }
    if (this.overridable) {
      out += '; overridable';
    }
    return out + ')';
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private recheckInScope(
    packageName: string | null | undefined,
    allowedState: OverrideAllowedState,
    installedVersionCode: number | null | undefined,
  ): boolean {
    if (packageName === null || packageName === undefined || packageName === '') {
      return false;
    }
    const override = this.rawOverrides.get(packageName);
    // Not installed (or a bogus version), no raw override, or not allowed.
    if (
      installedVersionCode === null ||
      installedVersionCode === undefined ||
      !Number.isSafeInteger(installedVersionCode) ||
      override === undefined ||
      !allowedState.isAllowed()
    ) {
      this.removeEvaluated(packageName);
      return false;
    }
    switch (override.evaluate(installedVersionCode)) {
      case OverrideValue.Undefined:
        this.removeEvaluated(packageName);
        break;
      case OverrideValue.Enabled:
        this.setEvaluated(packageName, true);
        break;
      case OverrideValue.Disabled:
        this.setEvaluated(packageName, false);
        break;
    }
    return true;
  }

  private foldForLoad(snapshot: ChangeOverrides): FoldedOverrides {
    if (snapshot.changeId !== this.id) {
      throw new IllegalArgumentError(
        `Overrides for change ${snapshot.changeId} cannot be loaded into ${this.toString()}`,
      );
    }
    const folded = foldChangeOverrides(snapshot);
    if (folded.raw.size > 0 || folded.evaluated.size > 0) {
      this.checkOverridesPermitted();
    }
    return folded;
  }

  private setEvaluated(packageName: string, enabled: boolean): void {
    this.checkOverridesPermitted();
    this.evaluatedOverrides.set(packageName, enabled);
    this.emit({
      kind: OverrideEventKind.EvaluatedSet,
      changeId: this.id,
      packageName,
      enabled,
    });
    this.notifyListener(packageName);
  }

  private removeEvaluated(packageName: string): void {
    if (this.evaluatedOverrides.delete(packageName)) {
      this.emit({
        kind: OverrideEventKind.EvaluatedRemoved,
        changeId: this.id,
        packageName,
      });
      this.notifyListener(packageName);
    }
  }

  private checkOverridesPermitted(): void {
    if (this.loggingOnly) {
      throw new IllegalArgumentError(
        `Can't add overrides for a logging only change ${this.toString()}`,
      );
    }
  }

  private notifyListener(packageName: string): void {
    this.listener?.onChanged(packageName);
  }

  private emit(event: OverrideEventInput): void {
    this.pendingEvents.push(event);
  }

  /**
   * Run a mutation inside this change's serialization scope, then deliver
   * the events it queued. Events are delivered even when the listener threw,
   * since the maps were already updated by then.
   */
  private serialized<T>(mutation: () => T): T {
    if (this.mutating) {
      throw new IllegalStateError(
        `Re-entrant mutation of change ${this.id}; listeners must not modify the change ` +
          'that notified them.',
      );
    }
    this.mutating = true;
    let outcome: { ok: true; value: T } | { ok: false; error: unknown };
    try {
      outcome = { ok: true, value: mutation() };
    } catch (error: unknown) {
      outcome = { ok: false, error };
    }
    this.mutating = false;

    const events = this.pendingEvents;
    this.pendingEvents = [];
    try {
      this.logger.recordAll(events);
    } catch (logError: unknown) {
      if (outcome.ok) {
        throw logError;
      }
      throw new AggregateError(
        [outcome.error, logError],
        `Change ${this.id} mutation and its event log both failed`,
      );
    }

    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }
}

/**
 * Fold the legacy "enabled after" gate into the "enabled since" form.
 * Non-positive values mean ungated.
 */
function normaliseSdkGate(definition: ChangeDefinition): number {
  const after = definition.enableAfterTargetSdk ?? NO_SDK_GATE;
  const since = definition.enableSinceTargetSdk ?? NO_SDK_GATE;
  if (after > 0) {
    return after + 1;
  }
  if (since > 0) {
    return since;
  }
  return NO_SDK_GATE;
}

function formatMap(map: ReadonlyMap<string, { toString(): string }>): string {
  const entries = Array.from(map.keys())
    .sort()
    .map((key) => `${key}=${String(map.get(key))}`);
  return `{${entries.join(', ')}}`;
}
