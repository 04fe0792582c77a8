/**
 * appcompat Runtime Host: StateIO
 *
 * An injectable I/O abstraction for reading/writing JSON state files and
 * appending to JSONL log files under one home directory.
 *
 * Two implementations are provided:
 *   - FileStateIO: durable file I/O under a home directory
 *   - MemoryStateIO: in-memory I/O for tests and embedded use
 *
 * Reads are validated against a zod schema, so callers receive typed values
 * without trusting the bytes on disk.
 */

import {
  appendFileSync,
  mkdirSync,
  readFileSync,
  renameSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';
import type { z } from 'zod';
import { PersistedStateError } from '../errors.js';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * Reads, writes and appends state by relative filename.
 *
 * - readJson and writeJson address the `state/` subdirectory
 * - appendLine addresses the `logs/` subdirectory
 *
 * Logs are append-only through this interface.
 */
export interface StateIO {
  /**
   * Read, parse and validate a JSON state file.
   *
   * Returns `fallback` if the file does not exist or is not JSON.
   *
   * @throws {PersistedStateError} If the JSON does not match `schema`
   */
  readJson<T>(filename: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T;

  /**
   * Serialize a value as JSON and replace the file with it. The previous
   * content stays intact until the new content is fully written.
   */
  writeJson<T>(filename: string, value: T): void;

  /** Append one line (newline added) to a log file. */
  appendLine(logfilename: string, line: string): void;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * File-system StateIO rooted at a home directory.
 *
 * Reads JSON state from  `<home>/state/<filename>`.
 * Writes JSON state to   `<home>/state/<filename>` via a `.tmp` sibling and rename.
 * Appends log lines to   `<home>/logs/<logfilename>`.
 *
 * Directories are created on demand. I/O is synchronous; override state is
 * small and callers persist it outside any hot path.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson<T>(filename: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
    const filePath = join(this.homeDir, 'state', filename);
    let raw: string;
    try {
      raw = readFileSync(filePath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return fallback;
      }
      throw err;
    }
    return parseState(filename, raw, schema, fallback);
  }

  writeJson<T>(filename: string, value: T): void {
    const stateDir = join(this.homeDir, 'state');
    mkdirSync(stateDir, { recursive: true });
    const filePath = join(stateDir, filename);
    const tmpPath = `${filePath}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(value, null, 2), 'utf-8');
    renameSync(tmpPath, filePath);
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. State is kept as serialized JSON text so reads go
 * through the same parse and validation path as FileStateIO.
 */
export class MemoryStateIO implements StateIO {
  private readonly files: Map<string, string> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  readJson<T>(filename: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
    const raw = this.files.get(filename);
    if (raw === undefined) {
      return fallback;
    }
    return parseState(filename, raw, schema, fallback);
  }

  writeJson<T>(filename: string, value: T): void {
    this.files.set(filename, JSON.stringify(value, null, 2));
  }

  /**
   * Store raw text as a state file. Not part of StateIO; lets tests plant
   * corrupt or legacy content.
   */
  writeRaw(filename: string, content: string): void {
    this.files.set(filename, content);
  }

  /** Raw text of a state file, if written. Not part of StateIO. */
  readRaw(filename: string): string | undefined {
    return this.files.get(filename);
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** All lines appended to a log file. Not part of StateIO. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function parseState<T>(
  filename: string,
  raw: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T,
): T {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) {
      return fallback;
    }
    throw err;
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    throw new PersistedStateError(filename, result.error.message);
  }
  return result.data;
}

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
