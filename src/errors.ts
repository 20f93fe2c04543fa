/**
 * Thrown when the frontend's own contracts are broken (never for bad input).
 * Malformed source is always reported through `Diagnostics` instead.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(`internal error: ${message}`);
    this.name = "InvariantError";
  }
}
