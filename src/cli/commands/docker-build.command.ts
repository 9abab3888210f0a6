import { Inject, Injectable } from "@nestjs/common";
import { ConfigService } from "../../config/config.service";
import { LoggerService } from "../../io/logger.service";
import { DockerService } from "../../workspace/docker.service";
import type { CliArguments } from "../cli-arguments";
import { CliOptionsService } from "../cli-options.service";
import type { CliCommand, CliCommandMetadata } from "./cli-command";

@Injectable()
export class DockerBuildCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "docker-build",
    description: "run 'docker build' for the prepared working directory",
  };

  constructor(
    @Inject(CliOptionsService) private readonly optionsService: CliOptionsService,
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(LoggerService) private readonly loggerService: LoggerService,
    @Inject(DockerService) private readonly docker: DockerService,
  ) {}

  async execute(args: CliArguments): Promise<void> {
    if (args.positionals.length !== 1) {
      throw new Error("The docker-build command requires exactly one TAG argument.");
    }

    const options = this.optionsService.parse(args.options);
    const config = await this.configService.load(options.runtime);
    this.loggerService.configure(config.logging);

    const [tag] = args.positionals;
    const dockerArgs = await this.docker.build({
      tag,
      release: options.release,
      options: options.dockerOptions,
    });

    this.loggerService
      .getLogger("cli:docker-build")
      .info({ args: dockerArgs }, `Built image ${tag}`);
  }
}
