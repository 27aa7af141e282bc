import { GitExecError } from "../errors/git-exec-error.js";
import type { IndexLoader } from "../interfaces/index-loader.js";
import { type Logger, silentLogger } from "../logger.js";
import type { GitRunner } from "./git-runner.js";

export const REFRESH_ARGS = ["update-index", "-q", "--refresh", "--unmerged"];

/**
 * Checks that the index is readable, then refreshes its stat data.
 *
 * `ls-files --unmerged` reads the whole index and prints only conflicted
 * entries. The refresh keeps files whose timestamps changed but whose
 * content did not from being listed with zero counts. It needs a writable
 * index; when it fails the stale stat data is used as is.
 */
export class GitIndexLoader implements IndexLoader {
  constructor(
    private readonly git: GitRunner,
    private readonly logger: Logger = silentLogger,
  ) {}

  async load(): Promise<boolean> {
    try {
      await this.git.run(["ls-files", "--unmerged"]);
    } catch (err) {
      if (err instanceof GitExecError) {
        this.logger.debug(`cannot read index: ${err.message}`);
        return false;
      }
      throw err;
    }

    await this.refresh();
    return true;
  }

  private async refresh(): Promise<void> {
    try {
      await this.git.run(REFRESH_ARGS);
    } catch (err) {
      if (!(err instanceof GitExecError)) {
        throw err;
      }
      this.logger.debug(`index not refreshed: ${err.message}`);
    }
  }
}
