/**
 * appcompat Core: Type Exports
 *
 * Re-exports all core types from a single entry point.
 * No logic lives in this file.
 */

export { AllowedStateReason } from './allowed-state.js';

export type { ApplicationInfo, BuildInfo } from './app.js';

export type { ChangeDefinition, ChangeInfo, ChangeListener } from './change.js';
export { NO_SDK_GATE } from './change.js';

export type {
  ChangeOverrides,
  OverrideValueEntry,
  RawOverrideEntry,
} from './snapshot.js';
