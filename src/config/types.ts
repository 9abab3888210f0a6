export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export interface LoggingDestination {
  type: "stdout" | "stderr" | "file";
  path?: string;
  pretty?: boolean;
  colorize?: boolean;
}

export interface LoggingConfig {
  level: LogLevel;
  destination?: LoggingDestination;
  enableTimestamps?: boolean;
}

export interface BaseImageConfig {
  /** Repository holding the base image and its configuration document. */
  repositoryUrl: string;
}

export interface PatternsConfig {
  /** Matches the single job script file inside each project repository. */
  scriptSource: string;
  /** Matches the configuration document inside the base image checkout. */
  baseDocument: string;
}

export interface OutputConfig {
  lineWidth: number;
}

export interface AssemblerConfig {
  projectsDir: string;
  baseImage: BaseImageConfig;
  repositories: string[];
  patterns: PatternsConfig;
  output: OutputConfig;
  logging: LoggingConfig;
}

export interface AssemblerConfigInput {
  projectsDir?: string;
  baseImage?: Partial<BaseImageConfig>;
  repositories?: string[];
  patterns?: Partial<PatternsConfig>;
  output?: Partial<OutputConfig>;
  logging?: Partial<LoggingConfig>;
}

/**
 * Options collected from the command line that influence how the tool
 * configuration itself is resolved.
 */
export interface CliRuntimeOptions {
  config?: string;
  logLevel?: LogLevel;
  logFile?: string;
}
