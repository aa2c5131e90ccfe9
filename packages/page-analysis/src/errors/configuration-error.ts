/**
 * ConfigurationError
 *
 * Thrown when environment configuration cannot be parsed or is
 * inconsistent. Lists every offending key in `issues`.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}
