import { Inject, Injectable } from "@nestjs/common";
import { LoggerService } from "../io/logger.service";
import { CLI_COMMANDS, CLI_OPTIONS, CLI_PROGRAM_NAME } from "./cli.constants";
import type { CliCommand } from "./commands/cli-command";
import type { CliArguments } from "./cli-arguments";
import { CliParserService, CliParseError } from "./cli-parser.service";

@Injectable()
export class CliRunnerService {
  constructor(
    @Inject(CliParserService) private readonly parser: CliParserService,
    @Inject(CLI_COMMANDS) private readonly commands: CliCommand[],
    @Inject(LoggerService) private readonly loggerService: LoggerService,
  ) {}

  async run(argv: string[]): Promise<void> {
    const normalizedArgs = argv[0] === "--" ? argv.slice(1) : argv;

    if (normalizedArgs.length === 0 || this.isHelpRequest(normalizedArgs[0])) {
      this.printUsage();
      if (normalizedArgs.length === 0) {
        throw new Error("No command provided.");
      }
      return;
    }

    let parsed: CliArguments;
    try {
      parsed = this.parser.parse(normalizedArgs);
    } catch (error) {
      if (error instanceof CliParseError) {
        throw new Error(error.message);
      }
      throw error;
    }

    const command = this.resolveCommand(parsed.command);
    if (!command) {
      throw new Error(`Unknown command: ${parsed.command}`);
    }

    this.loggerService
      .getLogger("cli")
      .debug(`Executing command ${command.metadata.name}`);

    await command.execute(parsed);
  }

  private resolveCommand(name: string): CliCommand | undefined {
    const normalized = name.toLowerCase();
    return this.commands.find((command) => {
      const { metadata } = command;
      if (metadata.name === normalized) {
        return true;
      }
      return metadata.aliases?.some((alias) => alias.toLowerCase() === normalized);
    });
  }

  private isHelpRequest(token: string): boolean {
    return ["help", "-h", "--help"].includes(token);
  }

  private printUsage(): void {
    const rows = this.commands.map(({ metadata }) => {
      const aliasSuffix = metadata.aliases?.length
        ? ` (aliases: ${metadata.aliases.join(", ")})`
        : "";
      return `- ${metadata.name}${aliasSuffix}: ${metadata.description}`;
    });

    console.log(`Usage: ${CLI_PROGRAM_NAME} <command> [options]`);
    console.log("");
    console.log("Available commands:");
    for (const row of rows) {
      console.log(row);
    }
    console.log("");
    console.log("Options:");
    for (const option of CLI_OPTIONS) {
      const scope = option.commands ? ` [${option.commands.join(", ")}]` : "";
      console.log(`  ${option.flags.join(", ")}${scope}: ${option.description}`);
    }
  }
}
