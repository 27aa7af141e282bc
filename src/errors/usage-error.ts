import { StatusError } from "./status-error.js";

/**
 * Thrown when the command line selects no mode or names an unknown option.
 */
export class UsageError extends StatusError {
  readonly argument?: string;

  constructor(message: string, argument?: string) {
    super(message);
    this.name = "UsageError";
    this.argument = argument;
  }
}
