import { GitExecError } from "../errors/git-exec-error.js";
import type { ReferenceResolver } from "../interfaces/reference-resolver.js";
import type { GitRunner } from "./git-runner.js";

export class GitReferenceResolver implements ReferenceResolver {
  constructor(private readonly git: GitRunner) {}

  async resolve(name: string): Promise<string | undefined> {
    try {
      const stdout = await this.git.run(["rev-parse", "--verify", "--quiet", `${name}^{commit}`]);
      return stdout.trim() || undefined;
    } catch (err) {
      // --quiet --verify exits 1 without output when the name does not resolve
      if (err instanceof GitExecError && err.exitCode === 1) {
        return undefined;
      }
      throw err;
    }
  }

  /**
   * Hashes an empty tree without writing it, so SHA-256 repositories get
   * their own id.
   */
  async emptyTree(): Promise<string> {
    const stdout = await this.git.run(["hash-object", "-t", "tree", "--stdin"], { input: "" });
    return stdout.trim();
  }
}
