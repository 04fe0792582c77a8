/**
 * appcompat Core: Override Allowed-State Reasons
 *
 * The allow-list policy lives outside this package. Callers evaluate it and
 * hand the verdict to ChangeState as an OverrideAllowedState; these are the
 * reasons that verdict can carry.
 */

export enum AllowedStateReason {
  /** The override may be applied. */
  Allowed = 'Allowed',
  /**
   * The package is not installed yet, so the policy cannot be checked.
   * enforce() lets the caller record the override, but it is not applied
   * until a later recheck arrives with Allowed.
   */
  DeferredVerification = 'DeferredVerification',
  /** Non-debuggable app on a user build. */
  DisabledNotDebuggable = 'DisabledNotDebuggable',
  /** Change is not gated by target SDK and the build is a user build. */
  DisabledNonTargetSdk = 'DisabledNonTargetSdk',
  /** App targets an SDK above the change's threshold. */
  DisabledTargetSdkTooHigh = 'DisabledTargetSdkTooHigh',
  /** Change is logging-only and takes no overrides. */
  LoggingOnlyChange = 'LoggingOnlyChange',
  /** Change threshold is above the platform SDK. */
  PlatformTooOld = 'PlatformTooOld',
}
