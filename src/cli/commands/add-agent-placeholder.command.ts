import { Inject, Injectable } from "@nestjs/common";
import { AssemblyService } from "../../assembly/assembly.service";
import { ConfigService } from "../../config/config.service";
import { DocumentWriterService } from "../../io/document-writer.service";
import { LoggerService } from "../../io/logger.service";
import type { CliArguments } from "../cli-arguments";
import { CliOptionsService } from "../cli-options.service";
import type { CliCommand, CliCommandMetadata } from "./cli-command";

@Injectable()
export class AddAgentPlaceholderCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "addagent-placeholder",
    description:
      "add placeholder(s) for new Jenkins agents, to be defined at container run time",
  };

  constructor(
    @Inject(CliOptionsService) private readonly optionsService: CliOptionsService,
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(LoggerService) private readonly loggerService: LoggerService,
    @Inject(AssemblyService) private readonly assemblyService: AssemblyService,
    @Inject(DocumentWriterService) private readonly writer: DocumentWriterService,
  ) {}

  async execute(args: CliArguments): Promise<void> {
    if (args.positionals.length > 0) {
      throw new Error(
        "The addagent-placeholder command does not accept positional arguments.",
      );
    }

    const options = this.optionsService.parse(args.options);
    const config = await this.configService.load(options.runtime);
    this.loggerService.configure(config.logging);

    const result = await this.assemblyService.addAgentPlaceholders(config, {
      count: options.numAgents,
      cascPath: options.cascPath,
      mergeCascPath: options.mergeCascPath,
      env: options.env,
    });

    await this.writer.write(result.document, options.output);
  }
}
