/**
 * Errors raised by the engine. Out-of-range indices are not errors: store
 * operations report them through their return value.
 */

/** The persisted task document could not be parsed or decoded. Fatal for a load. */
export class TaskDocumentError extends Error {
  readonly slot: string;

  constructor(slot: string, message: string, options?: { cause?: unknown }) {
    super(`Malformed task document in slot '${slot}': ${message}`, options);
    this.name = 'TaskDocumentError';
    this.slot = slot;
  }
}
