import { Inject, Injectable } from "@nestjs/common";
import fs from "fs/promises";
import { PROCESS_RUNNER, type ProcessRunner } from "./process-runner";
import { repositoryNameFromUrl } from "./workspace.service";

@Injectable()
export class GitService {
  constructor(
    @Inject(PROCESS_RUNNER) private readonly runner: ProcessRunner,
  ) {}

  /** Clones each URL into `destination/<basename of url>`. */
  async clone(urls: readonly string[], destination: string): Promise<string[]> {
    await fs.mkdir(destination, { recursive: true });
    const cloned: string[] = [];
    for (const url of urls) {
      const name = repositoryNameFromUrl(url);
      await this.runner.run("git", ["clone", "--quiet", url, name], {
        cwd: destination,
      });
      cloned.push(name);
    }
    return cloned;
  }

  async currentBranch(cwd?: string): Promise<string> {
    const { stdout } = await this.runner.run(
      "git",
      ["branch", "--show-current"],
      { cwd },
    );
    return stdout.trim();
  }

  async currentCommit(cwd?: string): Promise<string> {
    const { stdout } = await this.runner.run(
      "git",
      ["show", "--format=%h", "--no-patch"],
      { cwd },
    );
    return stdout.trim();
  }
}
