import { Inject, Injectable } from "@nestjs/common";
import { AssemblyService } from "../../assembly/assembly.service";
import { ConfigService } from "../../config/config.service";
import { DocumentWriterService } from "../../io/document-writer.service";
import { LoggerService } from "../../io/logger.service";
import type { CliArguments } from "../cli-arguments";
import { CliOptionsService } from "../cli-options.service";
import type { CliCommand, CliCommandMetadata } from "./cli-command";

@Injectable()
export class AddJobsCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "addjobs",
    description:
      "add Jenkins jobs to the loaded configuration from the job-dsl file of each staged repo",
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
      throw new Error("The addjobs command does not accept positional arguments.");
    }

    const options = this.optionsService.parse(args.options);
    const config = await this.configService.load(options.runtime);
    this.loggerService.configure(config.logging);

    const result = await this.assemblyService.addJobs(config, {
      cascPath: options.cascPath,
      mergeCascPath: options.mergeCascPath,
      env: options.env,
      transformReadFileFromWorkspace: options.transformReadFileFromWorkspace,
    });

    this.loggerService
      .getLogger("cli:addjobs")
      .info(
        { injected: result.injected, skipped: result.skipped.map((entry) => entry.repository) },
        `Added ${result.injected.length} job script(s)`,
      );

    await this.writer.write(result.document, options.output);
  }
}
