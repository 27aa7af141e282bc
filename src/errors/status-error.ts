/**
 * Base error for everything this tool reports as a failure.
 */
export class StatusError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StatusError";
  }
}
