/**
 * appcompat Runtime Host: Error Types
 */

/**
 * Thrown when a persisted state file is valid JSON but does not match the
 * expected schema. A file that is not JSON at all reads as absent instead.
 */
export class PersistedStateError extends Error {
  constructor(
    readonly filename: string,
    detail: string,
  ) {
    super(`Persisted state '${filename}' is invalid: ${detail}`);
    this.name = 'PersistedStateError';
  }
}
