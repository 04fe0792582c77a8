/**
 * @appcompat/core
 *
 * Override evaluation and reconciliation for a single compatibility change:
 * ChangeState, PackageOverride, the allow-list verdict, the persisted
 * snapshot fold, and the override event logger.
 *
 * This package is side-effect free. It imports no node:fs or other I/O API;
 * persistence and log sinks live in @appcompat/runtime-host.
 */

// Types
export type {
  ApplicationInfo,
  BuildInfo,
  ChangeDefinition,
  ChangeInfo,
  ChangeListener,
  ChangeOverrides,
  OverrideValueEntry,
  RawOverrideEntry,
} from './types/index.js';
export { AllowedStateReason, NO_SDK_GATE } from './types/index.js';

// Errors
export {
  IllegalArgumentError,
  IllegalStateError,
  OverrideNotAllowedError,
} from './errors.js';

// Overrides
export {
  OverrideValue,
  PackageOverride,
  PackageOverrideBuilder,
} from './override/package-override.js';
export { OverrideAllowedState } from './override/allowed-state.js';

// Change state
export { ChangeState } from './change/change-state.js';
export type { ChangeStateOptions } from './change/change-state.js';
export { foldChangeOverrides, serializeChangeOverrides } from './change/overrides-snapshot.js';
export type { FoldedOverrides } from './change/overrides-snapshot.js';

// Logging (sink implementations live in runtime-host)
export type { OverrideLogSink } from './logging/log-sink.js';
export { OverrideEventKind, OverrideEventLogger } from './logging/override-log.js';
export type { OverrideEvent, OverrideEventInput } from './logging/override-log.js';
