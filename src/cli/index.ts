export * from "./cli-arguments";
export * from "./cli.constants";
export * from "./cli-options.service";
export * from "./cli-parser.service";
export * from "./cli-runner.service";
export * from "./cli.module";
export * from "./commands/cli-command";
export * from "./commands/add-jobs.command";
export * from "./commands/add-agent-placeholder.command";
export * from "./commands/setup.command";
export * from "./commands/docker-build.command";
