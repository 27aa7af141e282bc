/**
 * Integration tests against the git executable
 *
 * Each test builds a throwaway repository with native git and runs the
 * command in it. Skipped when git is not installed.
 */

import { execFileSync } from "node:child_process";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ExitCode, runCli } from "../../src/cli/run-cli.js";
import { createGitRunner } from "../../src/git/git-runner.js";
import { GitReferenceResolver } from "../../src/git/git-reference-resolver.js";
import { EMPTY_TREE_ID } from "../../src/interfaces/reference-resolver.js";
import { silentLogger } from "../../src/logger.js";

const HEADER = "            staged     unstaged path";

/** Keeps the user's and the system's git configuration out of the tests */
const GIT_ENV = {
  GIT_CONFIG_GLOBAL: os.devNull,
  GIT_CONFIG_NOSYSTEM: "1",
};

function isGitAvailable(): boolean {
  try {
    execFileSync("git", ["--version"], { stdio: "ignore" });
    return true;
  } catch {
    return false;
  }
}

/**
 * Run git command in a directory
 */
function git(args: string[], cwd: string): string {
  return execFileSync("git", args, {
    cwd,
    encoding: "utf-8",
    env: { ...process.env, ...GIT_ENV },
    stdio: ["pipe", "pipe", "pipe"],
  });
}

function commit(cwd: string, message: string): void {
  git(["-c", "user.name=Test User", "-c", "user.email=test@test.com", "commit", "-q", "-m", message], cwd);
}

describe.runIf(isGitAvailable())("status against native git", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), "diffstat-status-"));
    git(["init", "-q"], testDir);
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  async function status(): Promise<{ code: number; stdout: string; stderr: string }> {
    const stdout: string[] = [];
    const stderr: string[] = [];
    const code = await runCli(["--status"], {
      stdout: { write: (chunk: string) => stdout.push(chunk) },
      stderr: { write: (chunk: string) => stderr.push(chunk) },
      cwd: testDir,
      terminal: { isTTY: false, term: "xterm" },
      logger: silentLogger,
      createGit: (cwd) => createGitRunner({ cwd, env: GIT_ENV }),
    });
    return { code, stdout: stdout.join(""), stderr: stderr.join("") };
  }

  async function write(name: string, content: string): Promise<void> {
    await fs.writeFile(path.join(testDir, name), content);
  }

  it("should hash the empty tree to the known id", async () => {
    const resolver = new GitReferenceResolver(createGitRunner({ cwd: testDir, env: GIT_ENV }));

    expect(await resolver.emptyTree()).toBe(EMPTY_TREE_ID);
  });

  it("should print a blank line in a fresh repository", async () => {
    expect(await status()).toEqual({ code: ExitCode.SUCCESS, stdout: "\n", stderr: "" });
  });

  it("should report a staged file before the first commit", async () => {
    await write("new.txt", "one\ntwo\n");
    git(["add", "new.txt"], testDir);

    const result = await status();

    expect(result.code).toBe(ExitCode.SUCCESS);
    expect(result.stdout).toBe(`${HEADER}\n  1:        +2/-0      nothing new.txt\n\n`);
    expect(result.stderr).toBe("");
  });

  it("should report staged and unstaged changes after a commit", async () => {
    await write("a.txt", "1\n2\n3\n");
    await write("b.txt", "x\ny\n");
    git(["add", "a.txt", "b.txt"], testDir);
    commit(testDir, "initial");

    await write("a.txt", "1\n2\n3\n4\n");
    await write("b.txt", "x\nz\n");
    await write("c.txt", "new\n");
    git(["add", "b.txt", "c.txt"], testDir);

    const result = await status();

    expect(result.code).toBe(ExitCode.SUCCESS);
    expect(result.stdout).toBe(
      `${HEADER}\n` +
        "  1:    unchanged        +1/-0 a.txt\n" +
        "  2:        +1/-1      nothing b.txt\n" +
        "  3:        +1/-0      nothing c.txt\n" +
        "\n",
    );
  });

  it("should not list a file whose timestamp changed but whose content did not", async () => {
    await write("a.txt", "same\n");
    git(["add", "a.txt"], testDir);
    commit(testDir, "initial");

    const later = new Date(Date.now() + 60_000);
    await fs.utimes(path.join(testDir, "a.txt"), later, later);

    expect((await status()).stdout).toBe("\n");
  });

  it("should fail outside a repository", async () => {
    const outside = await fs.mkdtemp(path.join(os.tmpdir(), "diffstat-status-bare-"));
    try {
      const stderr: string[] = [];
      const code = await runCli(["--status"], {
        stdout: { write: () => true },
        stderr: { write: (chunk: string) => stderr.push(chunk) },
        cwd: outside,
        terminal: { isTTY: false },
        logger: silentLogger,
        createGit: (cwd) =>
          createGitRunner({ cwd, env: { ...GIT_ENV, GIT_CEILING_DIRECTORIES: path.dirname(outside) } }),
      });

      expect(code).toBe(ExitCode.FATAL);
      expect(stderr.join("")).toMatch(
        /^fatal: git rev-parse --git-dir failed with exit code 128: fatal: not a git repository/,
      );
    } finally {
      await fs.rm(outside, { recursive: true, force: true });
    }
  });
});
