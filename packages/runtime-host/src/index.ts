/**
 * @appcompat/runtime-host
 *
 * Side-effectful collaborators for @appcompat/core: state file I/O, the
 * overrides store, the JSONL override log sink and home directory
 * resolution. No core code imports from this package.
 */

export { PersistedStateError } from './errors.js';

// StateIO
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// Overrides persistence
export type { OverridesFile, OverridesLoadResult } from './state/overrides-store.js';
export {
  OVERRIDES_FILE,
  OverridesStore,
  changeOverridesSchema,
  overridesFileSchema,
} from './state/overrides-store.js';

// Logging
export { FileOverrideLogSink, OVERRIDES_LOG_FILE } from './logging/file-log-sink.js';
export { ulid } from './logging/ulid.js';

// Home directory
export type { OverridesRuntime, ResolveCompatHomeOptions } from './home.js';
export { HOME_ENV_VAR, createOverridesRuntime, resolveCompatHome } from './home.js';
