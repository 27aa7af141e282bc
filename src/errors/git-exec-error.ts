import { StatusError } from "./status-error.js";

/**
 * Thrown when a git process exits unsuccessfully.
 */
export class GitExecError extends StatusError {
  readonly args: readonly string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(args: readonly string[], exitCode: number | null, stderr: string, options?: ErrorOptions) {
    const detail = stderr.trim();
    let message = `git ${args.join(" ")} failed`;
    if (exitCode !== null) {
      message += ` with exit code ${exitCode}`;
    }
    if (detail) {
      message += `: ${detail}`;
    }
    super(message, options);
    this.name = "GitExecError";
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}
