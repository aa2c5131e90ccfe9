/**
 * ContractViolationError
 *
 * Thrown when a caller breaks an input contract (impossible page bounds,
 * out-of-range or duplicate page numbers, negative counts). These are
 * programming errors and are never converted into result values.
 */
export class ContractViolationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ContractViolationError';
  }

  /**
   * Throw when `condition` is false
   */
  static assert(condition: boolean, message: string): asserts condition {
    if (!condition) {
      throw new ContractViolationError(message);
    }
  }
}
