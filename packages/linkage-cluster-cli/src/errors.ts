/**
 * Bad input from the user: a malformed point file or invalid arguments.
 * Reported as a one-line diagnostic with a nonzero exit status.
 */
export class InputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InputError";
  }
}
