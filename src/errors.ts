/**
 * Error taxonomy. None of these is allowed to escape the CLI as a crash;
 * each command maps them to an exit status.
 */

/** The hook payload on stdin could not be turned into an event descriptor */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

/** A file the installer depends on is missing */
export class PreconditionError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'PreconditionError';
  }
}

/** The shell profile cannot be written */
export class PermissionError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'PermissionError';
  }
}

/** No speech or sound backend could produce output */
export class BackendUnavailableError extends Error {
  constructor(
    message: string,
    public readonly backend: string,
  ) {
    super(message);
    this.name = 'BackendUnavailableError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
