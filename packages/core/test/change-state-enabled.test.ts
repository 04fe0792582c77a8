/**
 * appcompat Core: ChangeState Default Policy Tests
 *
 * isEnabled(): evaluated override → disabled → SDK gate (clamped to the
 * platform SDK) → enabled. willBeEnabled(): raw overrides covering every
 * version, else the default.
 *
 * These tests are pure: no I/O, no clock.
 */

import { describe, it, expect } from 'vitest';
import {
  ChangeState,
  NO_SDK_GATE,
  OverrideAllowedState,
  PackageOverride,
} from '../src/index.js';
import type { ApplicationInfo, BuildInfo } from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const PLATFORM_34: BuildInfo = { platformTargetSdk: 34 };
const PLATFORM_30: BuildInfo = { platformTargetSdk: 30 };

function app(targetSdkVersion: number, packageName = 'com.example.app'): ApplicationInfo {
  return { packageName, targetSdkVersion };
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

describe('ChangeState construction', () => {
  it('starts with no overrides and ungated defaults', () => {
    const change = new ChangeState({ id: 1 });
    expect(change.enableSinceTargetSdk).toBe(NO_SDK_GATE);
    expect(change.disabled).toBe(false);
    expect(change.loggingOnly).toBe(false);
    expect(change.overridable).toBe(false);
    expect(change.name).toBeNull();
    expect(change.hasOverrides()).toBe(false);
  });

  it('converts a legacy enabled-after gate to enabled-since + 1', () => {
    const change = new ChangeState({ id: 1, enableAfterTargetSdk: 30, enableSinceTargetSdk: 25 });
    expect(change.enableSinceTargetSdk).toBe(31);
  });

  it('treats non-positive gates as ungated', () => {
    expect(new ChangeState({ id: 1, enableSinceTargetSdk: 0 }).enableSinceTargetSdk).toBe(
      NO_SDK_GATE,
    );
    expect(new ChangeState({ id: 1, enableAfterTargetSdk: -1 }).enableSinceTargetSdk).toBe(
      NO_SDK_GATE,
    );
  });

  it('rejects an id outside the safe integer range', () => {
    expect(() => new ChangeState({ id: 2 ** 60 })).toThrow(
      `Change id must be a safe integer, got ${2 ** 60}`,
    );
  });

  it('describes its static definition', () => {
    const change = new ChangeState({
      id: 9,
      name: 'GATED',
      enableSinceTargetSdk: 31,
      description: 'gated behaviour',
      overridable: true,
    });
    expect(change.describe()).toEqual({
      id: 9,
      name: 'GATED',
      enableSinceTargetSdk: 31,
      disabled: false,
      loggingOnly: false,
      description: 'gated behaviour',
      overridable: true,
    });
  });
});

// ---------------------------------------------------------------------------
// isEnabled
// ---------------------------------------------------------------------------

describe('ChangeState.isEnabled: default policy', () => {
  it('returns the default value when no application is given', () => {
    expect(new ChangeState({ id: 1 }).isEnabled(null, PLATFORM_34)).toBe(true);
    expect(new ChangeState({ id: 1, disabled: true }).isEnabled(undefined, PLATFORM_34)).toBe(
      false,
    );
  });

  it('a disabled change is off for every target SDK', () => {
    const change = new ChangeState({ id: 1, disabled: true, enableSinceTargetSdk: 20 });
    for (const sdk of [1, 20, 30, 34, 99]) {
      expect(change.isEnabled(app(sdk), PLATFORM_34)).toBe(false);
    }
  });

  it('an ungated change is on', () => {
    expect(new ChangeState({ id: 1 }).isEnabled(app(1), PLATFORM_34)).toBe(true);
  });

  it('gated at 31: target 30 on platform 34 is off', () => {
    const change = new ChangeState({ id: 1, enableSinceTargetSdk: 31 });
    expect(change.isEnabled(app(30), PLATFORM_34)).toBe(false);
  });

  it('gated at 31: target 33 on platform 34 is on', () => {
    const change = new ChangeState({ id: 1, enableSinceTargetSdk: 31 });
    expect(change.isEnabled(app(33), PLATFORM_34)).toBe(true);
  });

  it('gated at 31: target 33 on platform 30 is off (platform clamp)', () => {
    const change = new ChangeState({ id: 1, enableSinceTargetSdk: 31 });
    expect(change.isEnabled(app(33), PLATFORM_30)).toBe(false);
  });

  it('the gate is inclusive', () => {
    const change = new ChangeState({ id: 1, enableSinceTargetSdk: 31 });
    expect(change.isEnabled(app(31), PLATFORM_34)).toBe(true);
  });

  it('an application without a package name falls through to the policy', () => {
    const change = new ChangeState({ id: 1, enableSinceTargetSdk: 31 });
    expect(change.isEnabled({ packageName: null, targetSdkVersion: 33 }, PLATFORM_34)).toBe(true);
  });
});

describe('ChangeState.isEnabled: evaluated overrides take precedence', () => {
  it('an enabling override beats disabled', () => {
    const change = new ChangeState({ id: 1, disabled: true });
    change.setRawOverride(
      'com.example.app',
      PackageOverride.unconditional(true),
      OverrideAllowedState.ALLOWED,
      1,
    );
    expect(change.isEnabled(app(1), PLATFORM_34)).toBe(true);
    expect(change.isEnabled(app(1, 'com.example.other'), PLATFORM_34)).toBe(false);
  });

  it('a disabling override beats a satisfied SDK gate', () => {
    const change = new ChangeState({ id: 1, enableSinceTargetSdk: 31 });
    change.setRawOverride(
      'com.example.app',
      PackageOverride.unconditional(false),
      OverrideAllowedState.ALLOWED,
      1,
    );
    expect(change.isEnabled(app(33), PLATFORM_34)).toBe(false);
  });

  it('a raw override without a version code has no effect', () => {
    const change = new ChangeState({ id: 1, disabled: true });
    change.setRawOverride(
      'com.example.app',
      PackageOverride.unconditional(true),
      OverrideAllowedState.ALLOWED,
    );
    expect(change.isEnabled(app(1), PLATFORM_34)).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// willBeEnabled
// ---------------------------------------------------------------------------

describe('ChangeState.willBeEnabled', () => {
  it('returns the default for an absent package name', () => {
    expect(new ChangeState({ id: 1, disabled: true }).willBeEnabled(null)).toBe(false);
    expect(new ChangeState({ id: 1 }).willBeEnabled(undefined)).toBe(true);
  });

  it('follows an unconditional raw override before installation', () => {
    const change = new ChangeState({ id: 1, disabled: true });
    change.setRawOverride(
      'com.example.app',
      PackageOverride.unconditional(true),
      OverrideAllowedState.DEFERRED_VERIFICATION,
    );
    expect(change.willBeEnabled('com.example.app')).toBe(true);
    expect(change.isEnabled(app(1), PLATFORM_34)).toBe(false);
  });

  it('follows an unconditional disabling override', () => {
    const change = new ChangeState({ id: 1 });
    change.setRawOverride(
      'com.example.app',
      PackageOverride.unconditional(false),
      OverrideAllowedState.ALLOWED,
    );
    expect(change.willBeEnabled('com.example.app')).toBe(false);
  });

  it('falls back to the default for a version-bounded override', () => {
    const change = new ChangeState({ id: 1, disabled: true });
    change.setRawOverride(
      'com.example.app',
      PackageOverride.builder().setMinVersionCode(2).setEnabled(true).build(),
      OverrideAllowedState.ALLOWED,
    );
    expect(change.willBeEnabled('com.example.app')).toBe(false);
  });

  it('ignores evaluated overrides', () => {
    const change = new ChangeState({ id: 1, disabled: true });
    change.loadOverrides({
      changeId: 1,
      validated: [{ packageName: 'com.example.app', enabled: true }],
      raw: [{ packageName: 'com.example.app', minVersionCode: 3, enabled: true }],
    });
    expect(change.getEvaluatedOverride('com.example.app')).toBe(true);
    expect(change.willBeEnabled('com.example.app')).toBe(false);
  });
});
