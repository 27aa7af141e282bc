import type { ColorPalette } from "../color/color-config.js";
import { colorize } from "../color/color-value.js";
import { UsageError } from "../errors/usage-error.js";

export const PROGRAM_NAME = "diffstat-status";

export const USAGE_TEXT = `usage: ${PROGRAM_NAME} --status

    --status              print status information with diffstat
    -C <path>             run as if started in <path>
    -v, --verbose         log collection details to stderr
    -h, --help            show this help
`;

/**
 * Usage text with its first line in the help color.
 */
export function formatUsage(palette: ColorPalette): string {
  const newline = USAGE_TEXT.indexOf("\n");
  return colorize(USAGE_TEXT.slice(0, newline), palette.help) + USAGE_TEXT.slice(newline);
}

/**
 * Parsed command line.
 */
export interface CliOptions {
  /** Collect and print the report */
  status: boolean;
  help: boolean;
  verbose: boolean;
  /** Directory to run in, relative to the current one */
  directory?: string;
}

/**
 * Parse command line arguments.
 *
 * @throws UsageError on an unknown option, a stray argument or a missing
 *   option value
 */
export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    status: false,
    help: false,
    verbose: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    switch (arg) {
      case "--status":
        options.status = true;
        break;

      case "-v":
      case "--verbose":
        options.verbose = true;
        break;

      case "-h":
      case "--help":
        options.help = true;
        break;

      case "-C": {
        const directory = args[++i];
        if (directory === undefined) {
          throw new UsageError("option '-C' requires a value", arg);
        }
        options.directory = directory;
        break;
      }

      default:
        if (arg.startsWith("-")) {
          throw new UsageError(`unknown option '${arg.replace(/^-+/, "")}'`, arg);
        }
        throw new UsageError(`unexpected argument '${arg}'`, arg);
    }

    i++;
  }

  return options;
}

/**
 * Check that the command line selects something to do.
 *
 * @throws UsageError when neither --status nor --help is given
 */
export function validateOptions(options: CliOptions): void {
  if (!options.status && !options.help) {
    throw new UsageError("no command given");
  }
}
