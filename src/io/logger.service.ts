import { Injectable } from "@nestjs/common";
import fs from "fs";
import path from "path";
import pino, { type Logger, type LoggerOptions } from "pino";
import type { LoggingConfig, LoggingDestination } from "../config/types";

const DEFAULT_LOG_FILE = ".casc-assembler/logs/casc-assembler.log";

/**
 * LoggerService owns the process-wide pino logger. Output defaults to stderr
 * because stdout carries the assembled document.
 */
@Injectable()
export class LoggerService {
  private rootLogger: Logger | null = null;
  private cachedSignature = "";

  configure(config?: LoggingConfig): Logger {
    const signature = this.computeSignature(config);
    if (this.rootLogger && signature === this.cachedSignature) {
      return this.rootLogger;
    }
    this.rootLogger = this.buildLogger(config);
    this.cachedSignature = signature;
    return this.rootLogger;
  }

  getLogger(scope?: string): Logger {
    if (!this.rootLogger) {
      this.rootLogger = this.buildLogger();
    }
    if (!scope) {
      return this.rootLogger;
    }
    return this.rootLogger.child({ scope });
  }

  reset(): void {
    this.rootLogger = null;
    this.cachedSignature = "";
  }

  private computeSignature(config?: LoggingConfig): string {
    return JSON.stringify(config ?? {});
  }

  private resolvePrettyTransport(
    destination?: LoggingDestination,
  ): LoggerOptions["transport"] {
    const type = destination?.type ?? "stderr";
    const stream = type === "stdout" ? process.stdout : process.stderr;
    const wantsPretty = destination?.pretty ?? (type !== "file" && stream.isTTY === true);
    if (!wantsPretty || type === "file") return undefined;

    try {
      require.resolve("pino-pretty");
      return {
        target: "pino-pretty",
        options: {
          colorize: destination?.colorize ?? true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
          destination: type === "stdout" ? 1 : 2,
        },
      };
    } catch {
      return undefined;
    }
  }

  private prepareDestination(destination?: LoggingDestination) {
    switch (destination?.type) {
      case "stdout":
        return pino.destination({ fd: 1 });
      case "file": {
        const filePath = path.resolve(destination.path ?? DEFAULT_LOG_FILE);
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        return pino.destination({ dest: filePath, sync: false });
      }
      default:
        return pino.destination({ fd: 2 });
    }
  }

  private buildLogger(config?: LoggingConfig): Logger {
    const level = config?.level ?? "info";
    const destination = config?.destination;
    const options: LoggerOptions = {
      level,
      base: undefined,
      timestamp:
        config?.enableTimestamps === false
          ? false
          : pino.stdTimeFunctions.isoTime,
    };

    const transport = this.resolvePrettyTransport(destination);
    if (transport) {
      options.transport = transport;
      return pino(options);
    }

    return pino(options, this.prepareDestination(destination));
  }
}
