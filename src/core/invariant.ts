/**
 * Raised when an internal contract is broken (out-of-bounds cell access,
 * a malformed rotation). Never recovered from; the process reports it and
 * exits.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

export function invariant(
  condition: boolean,
  message: string | (() => string),
): asserts condition {
  if (condition) return;
  throw new InvariantError(typeof message === 'string' ? message : message());
}
