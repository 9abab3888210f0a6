import { Module } from "@nestjs/common";
import { DockerService } from "./docker.service";
import { GitService } from "./git.service";
import { ChildProcessRunner, PROCESS_RUNNER } from "./process-runner";
import { WorkspaceService } from "./workspace.service";

@Module({
  providers: [
    WorkspaceService,
    GitService,
    DockerService,
    { provide: PROCESS_RUNNER, useClass: ChildProcessRunner },
  ],
  exports: [WorkspaceService, GitService, DockerService, PROCESS_RUNNER],
})
export class WorkspaceModule {}
