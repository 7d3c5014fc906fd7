import execa from "execa";
import { logger } from "../utils/logger";

/**
 * Supplies the revision an image is tagged with.
 */
export interface RevisionSource {
  shortRevision(): Promise<string | undefined>;
}

export class GitRevisionSource implements RevisionSource {
  constructor(private readonly cwd: string = process.cwd()) {}

  /**
   * Abbreviated HEAD commit, or undefined outside a git work tree.
   */
  async shortRevision(): Promise<string | undefined> {
    const result = await execa("git", ["rev-parse", "--short", "HEAD"], { cwd: this.cwd, reject: false });

    if (result.exitCode !== 0) {
      logger.debug("No git revision available", { cwd: this.cwd, stderr: result.stderr });
      return undefined;
    }
    return result.stdout.trim() || undefined;
  }
}
