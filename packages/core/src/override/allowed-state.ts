/**
 * appcompat Core: Override Allowed State
 *
 * The opaque verdict of the external allow-list policy, passed into
 * ChangeState operations as a parameter rather than looked up. ChangeState
 * uses it two ways:
 *
 *   - isAllowed(): whether an override may take effect right now (recheck)
 *   - enforce(): whether the caller may mutate the override at all
 *                    (removeRawOverride); throws when not
 *
 * DeferredVerification passes enforce() but is not isAllowed(): the override
 * is recorded but stays dormant until a recheck arrives with Allowed.
 */

import { OverrideNotAllowedError } from '../errors.js';
import { AllowedStateReason } from '../types/allowed-state.js';

export class OverrideAllowedState {
  static readonly ALLOWED: OverrideAllowedState = new OverrideAllowedState(
    AllowedStateReason.Allowed,
  );

  static readonly DEFERRED_VERIFICATION: OverrideAllowedState = new OverrideAllowedState(
    AllowedStateReason.DeferredVerification,
  );

  /**
   * @param reason - The policy verdict
   * @param appTargetSdk - The app's target SDK, for messages; -1 if unknown
   * @param changeTargetSdk - The change's SDK threshold, for messages; -1 if unknown
   */
  constructor(
    readonly reason: AllowedStateReason,
    readonly appTargetSdk: number = -1,
    readonly changeTargetSdk: number = -1,
  ) {
    Object.freeze(this);
  }

  /** A disallowing verdict with the given reason. */
  static disallowed(
    reason: AllowedStateReason,
    appTargetSdk = -1,
    changeTargetSdk = -1,
  ): OverrideAllowedState {
    return new OverrideAllowedState(reason, appTargetSdk, changeTargetSdk);
  }

  isAllowed(): boolean {
    return this.reason === AllowedStateReason.Allowed;
  }

  /**
   * @throws {OverrideNotAllowedError} Unless the reason is Allowed or
   *   DeferredVerification.
   */
  enforce(changeId: number, packageName: string): void {
    const message = this.denialMessage(changeId, packageName);
    if (message !== null) {
      throw new OverrideNotAllowedError(changeId, packageName, this.reason, message);
    }
  }

  equals(other: OverrideAllowedState): boolean {
    return (
      this.reason === other.reason &&
      this.appTargetSdk === other.appTargetSdk &&
      this.changeTargetSdk === other.changeTargetSdk
    );
  }

  toString(): string {
    return `OverrideAllowedState(reason=${this.reason}; appTargetSdk=${this.appTargetSdk}; ` +
      `changeTargetSdk=${this.changeTargetSdk})`;
  }

  private denialMessage(changeId: number, packageName: string): string | null {
    switch (this.reason) {
      case AllowedStateReason.Allowed:
      case AllowedStateReason.DeferredVerification:
        return null;
      case AllowedStateReason.DisabledNotDebuggable:
        return 'Cannot override a change on a non-debuggable app and user build.';
      case AllowedStateReason.DisabledNonTargetSdk:
        return 'Cannot override a default enabled/disabled change on a user build.';
      case AllowedStateReason.DisabledTargetSdkTooHigh:
        return (
          `Cannot override ${changeId} for ${packageName} because the app's targetSdk ` +
          `(${this.appTargetSdk}) is above the change's targetSdk threshold ` +
          `(${this.changeTargetSdk})`
        );
      case AllowedStateReason.LoggingOnlyChange:
        return `Cannot override ${changeId} because it is marked as a logging-only change.`;
      case AllowedStateReason.PlatformTooOld:
        return (
          `Cannot override ${changeId} for ${packageName} because the change's targetSdk ` +
          `threshold (${this.changeTargetSdk}) is above the platform sdk.`
        );
    }
  }
}
