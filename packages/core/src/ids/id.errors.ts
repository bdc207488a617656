/**
 * Error thrown when a string is not a hierarchical ID, or when an ID
 * component is out of range
 */
export class InvalidIdError extends Error {
  constructor(public id: string, reason?: string) {
    super(reason ? `Invalid ID "${id}": ${reason}` : `Invalid ID format: ${id}`);
    this.name = 'InvalidIdError';
    Object.setPrototypeOf(this, InvalidIdError.prototype);
  }
}

/**
 * Error thrown when an ID uses the old random format (e.g. p-k7m), which
 * is recognized but carries no structure to parse
 */
export class LegacyIdError extends InvalidIdError {
  constructor(id: string) {
    super(id, 'legacy random ID format cannot be parsed into a typed ID');
    this.name = 'LegacyIdError';
    Object.setPrototypeOf(this, LegacyIdError.prototype);
  }
}

export function isInvalidIdError(error: unknown): error is InvalidIdError {
  return error instanceof InvalidIdError;
}

export function isLegacyIdError(error: unknown): error is LegacyIdError {
  return error instanceof LegacyIdError;
}
