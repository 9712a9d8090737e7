/**
 * Setup problem that aborts the whole run before any grading starts
 * (missing submissions root or tests directory, bad flag values, ...)
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
