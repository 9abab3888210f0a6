import { Injectable } from "@nestjs/common";
import { execFile, spawn } from "child_process";
import { MissingResourceError, ProcessExecutionError } from "../core/errors";

export interface ProcessResult {
  stdout: string;
  stderr: string;
}

export interface ProcessOptions {
  cwd?: string;
}

/**
 * Seam between the assembler and external executables (git, docker). Tests
 * bind an in-memory implementation to {@link PROCESS_RUNNER}.
 */
export interface ProcessRunner {
  /** Runs to completion with output captured. */
  run(
    command: string,
    args: readonly string[],
    options?: ProcessOptions,
  ): Promise<ProcessResult>;
  /**
   * Runs with stdout attached to the terminal and SIGINT forwarded to the
   * child. stderr is captured for the failure report.
   */
  runAttached(
    command: string,
    args: readonly string[],
    options?: ProcessOptions,
  ): Promise<void>;
}

export const PROCESS_RUNNER = Symbol("PROCESS_RUNNER");

const notInPath = (command: string) =>
  new MissingResourceError(command, `${command} cannot be found in the PATH!`);

const isMissingExecutable = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

@Injectable()
export class ChildProcessRunner implements ProcessRunner {
  run(
    command: string,
    args: readonly string[],
    options: ProcessOptions = {},
  ): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      execFile(
        command,
        [...args],
        { cwd: options.cwd, encoding: "utf-8" },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ stdout, stderr });
            return;
          }

          if (isMissingExecutable(error)) {
            reject(notInPath(command));
            return;
          }

          const exitCode = typeof error.code === "number" ? error.code : null;
          reject(new ProcessExecutionError([command, ...args], exitCode, stderr));
        },
      );
    });
  }

  runAttached(
    command: string,
    args: readonly string[],
    options: ProcessOptions = {},
  ): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        env: process.env,
        stdio: ["inherit", "inherit", "pipe"],
      });

      const forwardInterrupt = () => {
        child.kill("SIGINT");
      };
      process.on("SIGINT", forwardInterrupt);

      let stderr = "";
      child.stderr?.setEncoding("utf-8");
      child.stderr?.on("data", (chunk: string) => {
        stderr += chunk;
      });

      child.once("error", (error) => {
        process.off("SIGINT", forwardInterrupt);
        reject(isMissingExecutable(error) ? notInPath(command) : error);
      });

      child.once("close", (code) => {
        process.off("SIGINT", forwardInterrupt);
        if (code === 0) {
          resolve();
          return;
        }
        reject(new ProcessExecutionError([command, ...args], code, stderr));
      });
    });
  }
}
