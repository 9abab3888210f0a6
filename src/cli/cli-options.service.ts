import { Injectable } from "@nestjs/common";
import { LOG_LEVELS } from "../config/schema";
import type { CliRuntimeOptions, LogLevel } from "../config/types";
import { InvalidNodeCountError } from "../core/errors";
import { CliParseError } from "./cli-parser.service";

export interface CommandOptions {
  runtime: CliRuntimeOptions;
  cascPath?: string;
  mergeCascPath?: string;
  env: string[];
  transformReadFileFromWorkspace: boolean;
  numAgents: number;
  clean: boolean;
  dockerOptions: string[];
  release: boolean;
  output?: string;
}

export const DEFAULT_NUM_AGENTS = 1;

function toStringArray(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.map(String);
  }
  if (typeof value === "string") {
    return [value];
  }
  return [];
}

function toOptionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Positive integer, the way an operator types it: digits only. Values past
 * `Number.MAX_SAFE_INTEGER` are rejected rather than rounded.
 */
export function parsePositiveInteger(value: unknown): number {
  if (typeof value === "number" && Number.isSafeInteger(value) && value > 0) {
    return value;
  }
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    const parsed = Number.parseInt(value.trim(), 10);
    if (Number.isSafeInteger(parsed) && parsed > 0) {
      return parsed;
    }
  }
  throw new InvalidNodeCountError(value);
}

@Injectable()
export class CliOptionsService {
  parse(options: Record<string, unknown>): CommandOptions {
    const runtime: CliRuntimeOptions = {};

    const config = toOptionalString(options.config);
    if (config) runtime.config = config;

    if (typeof options.logLevel === "string") {
      if (!isLogLevel(options.logLevel)) {
        throw new CliParseError(
          `Invalid log level: ${options.logLevel} (expected ${LOG_LEVELS.join(", ")})`,
        );
      }
      runtime.logLevel = options.logLevel;
    }

    const logFile = toOptionalString(options.logFile);
    if (logFile) runtime.logFile = logFile;

    return {
      runtime,
      cascPath: toOptionalString(options.cascPath),
      mergeCascPath: toOptionalString(options.mergeCasc),
      env: toStringArray(options.env),
      transformReadFileFromWorkspace: options.transformRffw === true,
      numAgents:
        options.numAgents === undefined
          ? DEFAULT_NUM_AGENTS
          : parsePositiveInteger(options.numAgents),
      clean: options.clean === true,
      dockerOptions: toStringArray(options.opt),
      release: options.release === true,
      output: toOptionalString(options.output),
    };
  }
}
