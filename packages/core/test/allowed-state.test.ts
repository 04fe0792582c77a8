/**
 * appcompat Core: OverrideAllowedState Tests
 *
 * enforce() passes Allowed and DeferredVerification and throws
 * OverrideNotAllowedError for every other reason. isAllowed() is true for
 * Allowed only.
 */

import { describe, it, expect } from 'vitest';
import {
  AllowedStateReason,
  OverrideAllowedState,
  OverrideNotAllowedError,
} from '../src/index.js';

describe('OverrideAllowedState.isAllowed', () => {
  it('is true only for Allowed', () => {
    expect(OverrideAllowedState.ALLOWED.isAllowed()).toBe(true);
    expect(OverrideAllowedState.DEFERRED_VERIFICATION.isAllowed()).toBe(false);
    expect(
      OverrideAllowedState.disallowed(AllowedStateReason.DisabledNotDebuggable).isAllowed(),
    ).toBe(false);
  });
});

describe('OverrideAllowedState.enforce', () => {
  it('does not throw for Allowed or DeferredVerification', () => {
    expect(() => OverrideAllowedState.ALLOWED.enforce(1, 'com.example.app')).not.toThrow();
    expect(() =>
      OverrideAllowedState.DEFERRED_VERIFICATION.enforce(1, 'com.example.app'),
    ).not.toThrow();
  });

  it('throws OverrideNotAllowedError carrying change, package and reason', () => {
    const state = OverrideAllowedState.disallowed(AllowedStateReason.LoggingOnlyChange);
    let caught: unknown;
    try {
      state.enforce(42, 'com.example.app');
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(OverrideNotAllowedError);
    if (!(caught instanceof OverrideNotAllowedError)) return;
    expect(caught.changeId).toBe(42);
    expect(caught.packageName).toBe('com.example.app');
    expect(caught.reason).toBe(AllowedStateReason.LoggingOnlyChange);
    expect(caught.message).toBe(
      'Cannot override 42 because it is marked as a logging-only change.',
    );
  });

  it('names both SDK levels when the app targets above the threshold', () => {
    const state = OverrideAllowedState.disallowed(
      AllowedStateReason.DisabledTargetSdkTooHigh,
      33,
      30,
    );
    expect(() => state.enforce(7, 'com.example.app')).toThrow(
      "Cannot override 7 for com.example.app because the app's targetSdk (33) is above " +
        "the change's targetSdk threshold (30)",
    );
  });

  it('names the threshold when the platform is too old', () => {
    const state = OverrideAllowedState.disallowed(AllowedStateReason.PlatformTooOld, -1, 40);
    expect(() => state.enforce(7, 'com.example.app')).toThrow(
      "Cannot override 7 for com.example.app because the change's targetSdk threshold (40) " +
        'is above the platform sdk.',
    );
  });

  it('throws for every non-passing reason', () => {
    const denying = [
      AllowedStateReason.DisabledNotDebuggable,
      AllowedStateReason.DisabledNonTargetSdk,
      AllowedStateReason.DisabledTargetSdkTooHigh,
      AllowedStateReason.LoggingOnlyChange,
      AllowedStateReason.PlatformTooOld,
    ];
    for (const reason of denying) {
      expect(() => OverrideAllowedState.disallowed(reason).enforce(1, 'p')).toThrow(
        OverrideNotAllowedError,
      );
    }
  });
});

describe('OverrideAllowedState.equals', () => {
  it('compares reason and SDK levels', () => {
    const a = OverrideAllowedState.disallowed(AllowedStateReason.PlatformTooOld, 30, 34);
    const b = new OverrideAllowedState(AllowedStateReason.PlatformTooOld, 30, 34);
    const c = new OverrideAllowedState(AllowedStateReason.PlatformTooOld, 30, 35);
    expect(a.equals(b)).toBe(true);
    expect(a.equals(c)).toBe(false);
  });
});
