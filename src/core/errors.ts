/**
 * Domain errors raised by note backends.
 *
 * Backends throw these and never translate them; mapping to HTTP status
 * codes happens in the routes.
 */

export type BackendOperation = 'get' | 'set' | 'keys' | 'close';

export class NotesError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class NoteNotFoundError extends NotesError {
  constructor(public readonly id: string) {
    super(`Note '${id}' not found`);
  }
}

/**
 * The storage service could not be reached, rejected the call, timed out,
 * or returned a payload that is not a note.
 */
export class BackendUnavailableError extends NotesError {
  constructor(
    public readonly backend: string,
    public readonly operation: BackendOperation,
    cause?: unknown
  ) {
    super(`${backend} backend unavailable during ${operation}`, { cause });
  }
}
