import { Module, type Provider } from "@nestjs/common";
import { AssemblyModule } from "../assembly/assembly.module";
import { ConfigModule } from "../config/config.module";
import { IoModule } from "../io/io.module";
import { WorkspaceModule } from "../workspace/workspace.module";
import { CliOptionsService } from "./cli-options.service";
import { CliParserService } from "./cli-parser.service";
import { CliRunnerService } from "./cli-runner.service";
import { CLI_COMMANDS } from "./cli.constants";
import { AddAgentPlaceholderCommand } from "./commands/add-agent-placeholder.command";
import { AddJobsCommand } from "./commands/add-jobs.command";
import type { CliCommand } from "./commands/cli-command";
import { DockerBuildCommand } from "./commands/docker-build.command";
import { SetupCommand } from "./commands/setup.command";

const commandProviders: Provider[] = [
  AddJobsCommand,
  AddAgentPlaceholderCommand,
  SetupCommand,
  DockerBuildCommand,
  {
    provide: CLI_COMMANDS,
    useFactory: (
      addJobs: AddJobsCommand,
      addAgentPlaceholder: AddAgentPlaceholderCommand,
      setup: SetupCommand,
      dockerBuild: DockerBuildCommand,
    ): CliCommand[] => [addJobs, addAgentPlaceholder, setup, dockerBuild],
    inject: [
      AddJobsCommand,
      AddAgentPlaceholderCommand,
      SetupCommand,
      DockerBuildCommand,
    ],
  },
];

/**
 * CliModule bundles the command surface so commands and supporting services
 * can be injected wherever a Nest application context is available.
 */
@Module({
  imports: [ConfigModule, IoModule, WorkspaceModule, AssemblyModule],
  providers: [
    CliOptionsService,
    CliParserService,
    CliRunnerService,
    ...commandProviders,
  ],
  exports: [CliRunnerService],
})
export class CliModule {}
