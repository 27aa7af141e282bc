#!/usr/bin/env node

/**
 * diffstat-status - per-path staged and unstaged line counts
 *
 * Usage: diffstat-status --status
 */

import { runCli } from "./run-cli.js";

runCli(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  cwd: process.cwd(),
  terminal: {
    isTTY: Boolean(process.stdout.isTTY),
    term: process.env.TERM,
  },
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Unexpected error:", err);
    process.exit(1);
  });
