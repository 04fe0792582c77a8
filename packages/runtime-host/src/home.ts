/**
 * appcompat Runtime Host: Home Directory Resolution
 *
 * Resolves the directory that holds persisted overrides and override logs:
 *
 *   1. Explicit `home` option
 *   2. APPCOMPAT_HOME environment variable
 *   3. Default: ~/.appcompat
 *
 * Layout under the resolved home:
 *
 *   <home>/
 *     state/compat-overrides.json
 *     logs/overrides.jsonl
 */

import { existsSync, mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { OverrideEventLogger } from '@appcompat/core';
import { FileOverrideLogSink } from './logging/file-log-sink.js';
import { FileStateIO } from './state/state-io.js';
import type { StateIO } from './state/state-io.js';
import { OverridesStore } from './state/overrides-store.js';

export const HOME_ENV_VAR = 'APPCOMPAT_HOME';

export interface ResolveCompatHomeOptions {
  /** Highest-precedence override, e.g. from a command-line flag. */
  readonly home?: string | undefined;
}

/**
 * Resolve the home directory, creating it if it does not exist.
 *
 * @returns Absolute or caller-supplied path to the home directory
 */
export function resolveCompatHome(opts?: ResolveCompatHomeOptions): string {
  let home: string;
  const fromEnv = process.env[HOME_ENV_VAR];
  if (typeof opts?.home === 'string' && opts.home !== '') {
    home = opts.home;
  } else if (typeof fromEnv === 'string' && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = join(homedir(), '.appcompat');
  }

  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }
  return home;
}

/** The persistence and logging collaborators for one home directory. */
export interface OverridesRuntime {
  readonly home: string;
  readonly stateIO: StateIO;
  readonly store: OverridesStore;
  /** Pass to ChangeState options so mutations land in logs/overrides.jsonl. */
  readonly logger: OverrideEventLogger;
}

/** Wire FileStateIO, OverridesStore and a file-backed logger for a home. */
export function createOverridesRuntime(opts?: ResolveCompatHomeOptions): OverridesRuntime {
  const home = resolveCompatHome(opts);
  const stateIO = new FileStateIO(home);
  return {
    home,
    stateIO,
    store: new OverridesStore(stateIO),
    logger: new OverrideEventLogger(new FileOverrideLogSink(stateIO)),
  };
}
