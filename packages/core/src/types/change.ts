/**
 * appcompat Core: Change Definition Types
 */

/** Sentinel for "not gated by target SDK". */
export const NO_SDK_GATE = -1;

/**
 * Static definition of a compatibility change, as read from configuration
 * by the caller. Only `id` is required.
 */
export interface ChangeDefinition {
  readonly id: number;
  readonly name?: string | null | undefined;
  /**
   * Legacy "enabled after" gate. A value X > 0 is equivalent to
   * enableSinceTargetSdk = X + 1 and wins over enableSinceTargetSdk.
   */
  readonly enableAfterTargetSdk?: number | undefined;
  readonly enableSinceTargetSdk?: number | undefined;
  readonly disabled?: boolean | undefined;
  readonly loggingOnly?: boolean | undefined;
  readonly description?: string | null | undefined;
  readonly overridable?: boolean | undefined;
}

/**
 * The normalised, override-free description of a change. Returned by
 * ChangeState.describe().
 */
export interface ChangeInfo {
  readonly id: number;
  readonly name: string | null;
  /** Normalised SDK gate; NO_SDK_GATE when ungated. */
  readonly enableSinceTargetSdk: number;
  readonly disabled: boolean;
  readonly loggingOnly: boolean;
  readonly description: string | null;
  readonly overridable: boolean;
}

/**
 * Callback for override changes on one compatibility change.
 *
 * Called synchronously whenever the evaluated override for a package is set
 * or removed, typically so the caller can restart that package's process.
 */
export interface ChangeListener {
  onChanged(packageName: string): void;
}
