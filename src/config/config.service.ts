import { Injectable } from "@nestjs/common";
import fs from "fs/promises";
import path from "path";
import { parse as parseToml } from "smol-toml";
import yaml from "yaml";
import type { ZodType } from "zod";
import {
  CONFIG_FILENAMES,
  DEFAULT_CONFIG,
  PROJECT_LIST_FILENAME,
} from "./defaults";
import { ASSEMBLER_CONFIG_INPUT_SCHEMA, PROJECT_LIST_SCHEMA } from "./schema";
import type {
  AssemblerConfig,
  AssemblerConfigInput,
  CliRuntimeOptions,
  LoggingConfig,
} from "./types";

export class ConfigValidationError extends Error {}

const errorCode = (error: unknown): unknown =>
  error instanceof Error && "code" in error ? error.code : undefined;

/**
 * ConfigService resolves the tool configuration from disk, validates it and
 * layers CLI runtime overrides on top. A `jobs.toml` project list in the
 * working directory supplies `repositories` unless the config file sets them.
 */
@Injectable()
export class ConfigService {
  async load(
    options: CliRuntimeOptions = {},
    cwd: string = process.cwd(),
  ): Promise<AssemblerConfig> {
    const configPath = await this.resolveConfigPath(options, cwd);
    const fileConfig = configPath ? await this.readConfigFile(configPath) : {};
    const repositories =
      fileConfig.repositories ?? (await this.readProjectList(cwd));
    const merged = this.mergeConfig(DEFAULT_CONFIG, { ...fileConfig, repositories });
    return this.applyCliOverrides(merged, options);
  }

  parseSource(source: string, format: "yaml" | "json", origin: string): AssemblerConfigInput {
    let raw: unknown;
    try {
      raw = format === "json" ? JSON.parse(source) : yaml.parse(source);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigValidationError(`Unable to parse ${origin}: ${reason}`);
    }

    return this.validate(ASSEMBLER_CONFIG_INPUT_SCHEMA, raw ?? {}, origin);
  }

  /** Reads `[git] repo_urls` from a TOML project list. */
  parseProjectList(source: string, origin: string): string[] {
    let raw: unknown;
    try {
      raw = parseToml(source);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigValidationError(`Unable to parse ${origin}: ${reason}`);
    }

    return this.validate(PROJECT_LIST_SCHEMA, raw, origin).git.repo_urls;
  }

  private validate<T>(schema: ZodType<T>, raw: unknown, origin: string): T {
    const result = schema.safeParse(raw);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => {
          const location = issue.path.map(String).join(".");
          return location ? `${location}: ${issue.message}` : issue.message;
        })
        .join("; ");
      throw new ConfigValidationError(`Invalid configuration in ${origin}: ${details}`);
    }

    return result.data;
  }

  private async readProjectList(cwd: string): Promise<string[] | undefined> {
    const candidate = path.resolve(cwd, PROJECT_LIST_FILENAME);
    let source: string;
    try {
      source = await fs.readFile(candidate, "utf-8");
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return undefined;
      }
      throw error;
    }
    return this.parseProjectList(source, candidate);
  }

  private async readConfigFile(candidate: string): Promise<AssemblerConfigInput> {
    const data = await fs.readFile(candidate, "utf-8");
    const format = candidate.endsWith(".json") ? "json" : "yaml";
    return this.parseSource(data, format, candidate);
  }

  private async resolveConfigPath(
    options: CliRuntimeOptions,
    cwd: string,
  ): Promise<string | null> {
    if (options.config) {
      const explicit = path.resolve(cwd, options.config);
      try {
        await fs.access(explicit);
        return explicit;
      } catch {
        throw new Error(`Config file not found at ${explicit}`);
      }
    }

    for (const name of CONFIG_FILENAMES) {
      const candidate = path.resolve(cwd, name);
      try {
        await fs.access(candidate);
        return candidate;
      } catch {
        // keep searching
      }
    }

    return null;
  }

  private mergeConfig(
    base: AssemblerConfig,
    input: AssemblerConfigInput,
  ): AssemblerConfig {
    const logging: LoggingConfig = {
      level: input.logging?.level ?? base.logging.level,
      destination: input.logging?.destination
        ? { ...base.logging.destination, ...input.logging.destination }
        : base.logging.destination,
      enableTimestamps:
        input.logging?.enableTimestamps ?? base.logging.enableTimestamps,
    };

    return {
      projectsDir: input.projectsDir ?? base.projectsDir,
      baseImage: {
        ...base.baseImage,
        ...(input.baseImage?.repositoryUrl
          ? { repositoryUrl: input.baseImage.repositoryUrl }
          : {}),
      },
      repositories: input.repositories
        ? [...input.repositories]
        : [...base.repositories],
      patterns: {
        scriptSource: input.patterns?.scriptSource ?? base.patterns.scriptSource,
        baseDocument: input.patterns?.baseDocument ?? base.patterns.baseDocument,
      },
      output: {
        lineWidth: input.output?.lineWidth ?? base.output.lineWidth,
      },
      logging,
    };
  }

  private applyCliOverrides(
    config: AssemblerConfig,
    options: CliRuntimeOptions,
  ): AssemblerConfig {
    const merged: AssemblerConfig = { ...config, logging: { ...config.logging } };

    if (options.logLevel) {
      merged.logging.level = options.logLevel;
    }

    if (options.logFile) {
      merged.logging.destination = {
        ...(merged.logging.destination ?? {}),
        type: "file",
        path: options.logFile,
        pretty: false,
        colorize: false,
      };
    }

    return merged;
  }
}
