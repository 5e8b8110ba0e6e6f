/**
 * Thrown when a configuration value, from the command line or the
 * environment, cannot be used.
 */
class ConfigError extends Error {
  constructor(
    message: string,
    public readonly setting: string,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export { ConfigError };
