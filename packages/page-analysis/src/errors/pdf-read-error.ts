/**
 * PdfReadError
 *
 * Raised by PDF readers when a command-line tool fails for a document or page.
 */
export class PdfReadError extends Error {
  constructor(
    message: string,
    public readonly pageNumber?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'PdfReadError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create PdfReadError from unknown error with context
   */
  static fromError(
    context: string,
    error: unknown,
    pageNumber?: number,
  ): PdfReadError {
    return new PdfReadError(
      `${context}: ${PdfReadError.getErrorMessage(error)}`,
      pageNumber,
      { cause: error },
    );
  }
}
