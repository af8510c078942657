/**
 * Raised for missing or invalid parameters, before any cloud call is made.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
