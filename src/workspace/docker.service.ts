import { Inject, Injectable } from "@nestjs/common";
import { GitService } from "./git.service";
import { PROCESS_RUNNER, type ProcessRunner } from "./process-runner";

export interface DockerBuildRequest {
  tag: string;
  /** Release builds stamp the image with the current git branch and commit. */
  release: boolean;
  /** Extra `docker build` options; each entry may hold several words. */
  options?: readonly string[];
  cwd?: string;
}

export interface ReleaseStamp {
  branch: string;
  commit: string;
}

export function buildDockerArguments(
  request: Pick<DockerBuildRequest, "tag" | "options">,
  stamp?: ReleaseStamp,
): string[] {
  const extra = (request.options ?? []).flatMap((option) =>
    option.split(/\s+/).filter(Boolean),
  );
  const buildArgs = stamp
    ? [
        "--build-arg",
        `BRANCH=${stamp.branch}`,
        "--build-arg",
        `COMMIT=${stamp.commit}`,
      ]
    : [];

  // "." is the build context sent to the docker daemon.
  return ["build", "--no-cache", ...buildArgs, "--tag", request.tag, ...extra, "."];
}

@Injectable()
export class DockerService {
  constructor(
    @Inject(GitService) private readonly git: GitService,
    @Inject(PROCESS_RUNNER) private readonly runner: ProcessRunner,
  ) {}

  async build(request: DockerBuildRequest): Promise<string[]> {
    const stamp = request.release
      ? {
          branch: await this.git.currentBranch(request.cwd),
          commit: await this.git.currentCommit(request.cwd),
        }
      : undefined;
    const args = buildDockerArguments(request, stamp);
    await this.runner.runAttached("docker", args, { cwd: request.cwd });
    return args;
  }
}
