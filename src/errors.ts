/**
 * Error taxonomy shared by the model, the store and the command layer.
 *
 * Every error the program raises on purpose carries a `kind` so the
 * dispatcher can translate it with a single lookup instead of instanceof
 * chains scattered over the handlers.
 */

export type ErrorKind = "validation" | "not_found" | "missing_argument" | "store";

export abstract class ContactBookError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed name, phone, birthday or numeric argument. */
export class ValidationError extends ContactBookError {
  readonly kind = "validation";
}

/** Lookup miss for a contact or one of its phones. */
export class NotFoundError extends ContactBookError {
  readonly kind = "not_found";
}

/** A command was given fewer arguments than it needs. */
export class MissingArgumentError extends ContactBookError {
  readonly kind = "missing_argument";
}

/** The persisted address book could not be read or written. */
export class StoreError extends ContactBookError {
  readonly kind = "store";
}

export function isContactBookError(error: unknown): error is ContactBookError {
  return error instanceof ContactBookError;
}

/**
 * Extract a string message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
