import { execFile } from "node:child_process";
import { promisify } from "node:util";

import { GitExecError } from "../errors/git-exec-error.js";

const execFileAsync = promisify(execFile);

export interface GitRunOptions {
  /** Written to git's stdin */
  input?: string;
}

/**
 * Executes git commands in one working copy.
 */
export interface GitRunner {
  /**
   * Run git and return its stdout decoded as UTF-8.
   *
   * @throws GitExecError if git cannot be started or exits non-zero
   */
  run(args: string[], options?: GitRunOptions): Promise<string>;

  /**
   * Run git and return its stdout bytes undecoded, e.g. for `-z` path lists.
   *
   * @throws GitExecError if git cannot be started or exits non-zero
   */
  runBuffer(args: string[], options?: GitRunOptions): Promise<Buffer>;
}

export interface GitRunnerOptions {
  /** Directory git runs in */
  cwd: string;
  /** Git executable (default: "git") */
  gitBinary?: string;
  /** Extra environment variables */
  env?: Record<string, string>;
  /** Largest stdout accepted, in bytes (default: 64 MB) */
  maxBuffer?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function stderrOf(err: unknown): string {
  if (!isRecord(err)) return "";
  if (typeof err.stderr === "string") return err.stderr;
  if (Buffer.isBuffer(err.stderr)) return err.stderr.toString("utf8");
  return "";
}

function toExecError(args: string[], err: unknown): GitExecError {
  const exitCode = isRecord(err) && typeof err.code === "number" ? err.code : null;
  return new GitExecError(args, exitCode, stderrOf(err), { cause: err });
}

/**
 * GitRunner backed by the git executable.
 */
export class ProcessGitRunner implements GitRunner {
  private readonly cwd: string;
  private readonly gitBinary: string;
  private readonly env?: Record<string, string>;
  private readonly maxBuffer: number;

  constructor(options: GitRunnerOptions) {
    this.cwd = options.cwd;
    this.gitBinary = options.gitBinary ?? "git";
    this.env = options.env;
    this.maxBuffer = options.maxBuffer ?? 64 * 1024 * 1024;
  }

  async run(args: string[], options: GitRunOptions = {}): Promise<string> {
    return (await this.runBuffer(args, options)).toString("utf8");
  }

  async runBuffer(args: string[], options: GitRunOptions = {}): Promise<Buffer> {
    try {
      const pending = execFileAsync(this.gitBinary, args, {
        cwd: this.cwd,
        encoding: "buffer",
        env: { ...process.env, ...this.env },
        maxBuffer: this.maxBuffer,
      });
      // Close stdin so a command reading it never waits for more
      pending.child.stdin?.end(options.input);
      const result = await pending;
      return result.stdout;
    } catch (err) {
      throw toExecError(args, err);
    }
  }
}

export function createGitRunner(options: GitRunnerOptions): GitRunner {
  return new ProcessGitRunner(options);
}
