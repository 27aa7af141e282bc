import * as path from "node:path";

import { type ColorPalette, resolvePalette, type TerminalInfo } from "../color/color-config.js";
import { colorize } from "../color/color-value.js";
import { ConfigError } from "../errors/config-error.js";
import { StatusError } from "../errors/status-error.js";
import { UsageError } from "../errors/usage-error.js";
import { createGitRunner, type GitRunner } from "../git/git-runner.js";
import { createConsoleLogger, type Logger } from "../logger.js";
import type { ReportOutput } from "../reporter.js";
import { formatUsage, PROGRAM_NAME, parseArgs, validateOptions } from "./cli.js";
import { loadPalette, runStatus } from "./run-status.js";

export const ExitCode = {
  SUCCESS: 0,
  FATAL: 128,
  USAGE: 129,
} as const;

/**
 * Process surroundings of one CLI invocation.
 */
export interface CliEnvironment {
  stdout: ReportOutput;
  stderr: ReportOutput;
  cwd: string;
  terminal: TerminalInfo;
  /** Default: a git process runner */
  createGit?: (cwd: string) => GitRunner;
  /** Default: console logger, verbose with --verbose */
  logger?: Logger;
}

/**
 * Run the command line and return the exit code.
 */
export async function runCli(args: string[], env: CliEnvironment): Promise<number> {
  // Until the configuration is read, errors use the default colors
  let palette: ColorPalette = resolvePalette({ colors: {} }, env.terminal);

  try {
    const options = parseArgs(args);
    if (options.help) {
      env.stdout.write(formatUsage(palette));
      return ExitCode.SUCCESS;
    }
    validateOptions(options);

    const cwd = options.directory ? path.resolve(env.cwd, options.directory) : env.cwd;
    const git = env.createGit ? env.createGit(cwd) : createGitRunner({ cwd });
    const logger =
      env.logger ?? createConsoleLogger({ verbose: options.verbose, prefix: `[${PROGRAM_NAME}]` });

    palette = await loadPalette(git, env.terminal);
    await runStatus({ git, palette, logger, out: env.stdout });
    return ExitCode.SUCCESS;
  } catch (err) {
    if (err instanceof UsageError) {
      env.stderr.write(`${colorize(`error: ${err.message}`, palette.error)}\n`);
      env.stderr.write(formatUsage(palette));
      return ExitCode.USAGE;
    }
    if (err instanceof StatusError) {
      const prefix = err instanceof ConfigError ? "fatal: bad config: " : "fatal: ";
      env.stderr.write(`${colorize(`${prefix}${err.message}`, palette.error)}\n`);
      return ExitCode.FATAL;
    }
    throw err;
  }
}
