/**
 * Raised for a malformed grid or an absent query.
 *
 * `code` lines up with the problem codes the HTTP layer emits.
 */
export class InvalidInputError extends Error {
  readonly code = "INVALID_ARGUMENT";

  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export function isInvalidInput(e: unknown): e is InvalidInputError {
  return e instanceof InvalidInputError;
}
