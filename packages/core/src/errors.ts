/**
 * appcompat Core: Error Types
 *
 * Programming errors (IllegalStateError, IllegalArgumentError) indicate a
 * caller bug and are never retried. Access-control denials
 * (OverrideNotAllowedError) are distinct so callers can decide whether to
 * retry once permission has been obtained.
 */

import type { AllowedStateReason } from './types/allowed-state.js';

/**
 * Thrown when an operation is invoked in a state that forbids it: a second
 * listener registration, or a mutation attempted while another mutation on
 * the same change is still running.
 */
export class IllegalStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IllegalStateError';
  }
}

/**
 * Thrown when an argument is unusable for the target change, e.g. adding an
 * override to a logging-only change or building a PackageOverride with
 * inverted version bounds.
 */
export class IllegalArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IllegalArgumentError';
  }
}

/**
 * Thrown by OverrideAllowedState.enforce() when the caller may not override
 * the change for the package.
 */
export class OverrideNotAllowedError extends Error {
  constructor(
    readonly changeId: number,
    readonly packageName: string,
    readonly reason: AllowedStateReason,
    message: string,
  ) {
    super(message);
    this.name = 'OverrideNotAllowedError';
  }
}
