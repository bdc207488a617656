/**
 * Error thrown when a counter allocation keeps losing the race for the
 * sync branch ref
 */
export class CounterAllocationError extends Error {
  constructor(
    public field: string,
    public retries: number,
    public attempts: number
  ) {
    super(
      `Failed to allocate ${field} after ${retries} retries (${attempts} attempts): ` +
      `the sync branch kept changing concurrently.`
    );
    this.name = 'CounterAllocationError';
    Object.setPrototypeOf(this, CounterAllocationError.prototype);
  }
}

export function isCounterAllocationError(error: unknown): error is CounterAllocationError {
  return error instanceof CounterAllocationError;
}
