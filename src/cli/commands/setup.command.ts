import { Inject, Injectable } from "@nestjs/common";
import path from "path";
import { ConfigService } from "../../config/config.service";
import { LoggerService } from "../../io/logger.service";
import { GitService } from "../../workspace/git.service";
import {
  repositoryNameFromUrl,
  WorkspaceService,
} from "../../workspace/workspace.service";
import type { CliArguments } from "../cli-arguments";
import { CliOptionsService } from "../cli-options.service";
import type { CliCommand, CliCommandMetadata } from "./cli-command";

@Injectable()
export class SetupCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "setup",
    description: "clone the configured project repos and the base image repo, run before docker-build",
  };

  constructor(
    @Inject(CliOptionsService) private readonly optionsService: CliOptionsService,
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(LoggerService) private readonly loggerService: LoggerService,
    @Inject(WorkspaceService) private readonly workspace: WorkspaceService,
    @Inject(GitService) private readonly git: GitService,
  ) {}

  async execute(args: CliArguments): Promise<void> {
    if (args.positionals.length > 0) {
      throw new Error("The setup command does not accept positional arguments.");
    }

    const options = this.optionsService.parse(args.options);
    const config = await this.configService.load(options.runtime);
    this.loggerService.configure(config.logging);
    const logger = this.loggerService.getLogger("cli:setup");

    const cwd = process.cwd();
    const projectsDir = path.resolve(cwd, config.projectsDir);
    const baseRepositoryDir = path.resolve(
      cwd,
      repositoryNameFromUrl(config.baseImage.repositoryUrl),
    );

    if (options.clean) {
      for (const target of [projectsDir, baseRepositoryDir]) {
        if (await this.workspace.remove(target)) {
          logger.info({ path: target }, "Removed checkout");
        }
      }
      return;
    }

    const projects = await this.git.clone(config.repositories, projectsDir);
    logger.info({ projects }, `Cloned ${projects.length} project repo(s)`);

    await this.git.clone([config.baseImage.repositoryUrl], cwd);
    logger.info({ path: baseRepositoryDir }, "Cloned base image repo");
  }
}
