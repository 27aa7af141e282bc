import { StatusError } from "./status-error.js";

/**
 * Thrown when a color setting cannot be parsed.
 */
export class ConfigError extends StatusError {
  readonly key: string;
  readonly value: string | null;

  constructor(key: string, value: string | null, message?: string) {
    super(message ?? `bad config value '${value ?? ""}' for '${key}'`);
    this.name = "ConfigError";
    this.key = key;
    this.value = value;
  }
}

/**
 * Thrown when a setting that requires a value is given without one.
 */
export class MissingConfigValueError extends ConfigError {
  constructor(key: string) {
    super(key, null, `missing value for '${key}'`);
    this.name = "MissingConfigValueError";
  }
}
