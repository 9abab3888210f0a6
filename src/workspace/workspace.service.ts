import { Injectable } from "@nestjs/common";
import type { Dirent } from "fs";
import fs from "fs/promises";
import path from "path";
import {
  parseConfigDocument,
  type ConfigDocument,
} from "../core/document/config-document";
import { AmbiguousResourceError, MissingResourceError } from "../core/errors";

export type ScriptSourceSelection =
  | { status: "selected"; repository: string; path: string }
  | { status: "missing"; repository: string }
  | { status: "ambiguous"; repository: string; candidates: string[] };

export interface BaseDocumentLocation {
  explicitPath?: string;
  baseRepositoryDir: string;
  pattern: RegExp;
}

const errorCode = (error: unknown): unknown =>
  error instanceof Error && "code" in error ? error.code : undefined;

export function repositoryNameFromUrl(url: string): string {
  return path.posix.basename(url.replace(/\/+$/, ""));
}

/**
 * File-system side of an assembly session: the staged project checkouts,
 * the base image checkout and the documents read from them.
 */
@Injectable()
export class WorkspaceService {
  async listRepositories(projectsDir: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(projectsDir, { withFileTypes: true });
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        throw new MissingResourceError(
          projectsDir,
          `'${path.basename(projectsDir)}' could not be found, run setup first.`,
        );
      }
      throw error;
    }

    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));
  }

  async findFiles(directory: string, pattern: RegExp): Promise<string[]> {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && pattern.test(entry.name))
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));
  }

  async selectScriptSource(
    projectsDir: string,
    repository: string,
    pattern: RegExp,
  ): Promise<ScriptSourceSelection> {
    const directory = path.join(projectsDir, repository);
    const candidates = await this.findFiles(directory, pattern);

    if (candidates.length === 0) {
      return { status: "missing", repository };
    }
    if (candidates.length > 1) {
      return { status: "ambiguous", repository, candidates };
    }
    return {
      status: "selected",
      repository,
      path: path.join(directory, candidates[0]),
    };
  }

  async resolveBaseDocumentPath(location: BaseDocumentLocation): Promise<string> {
    if (location.explicitPath) {
      return path.resolve(location.explicitPath);
    }

    const repository = path.basename(location.baseRepositoryDir);
    let candidates: string[];
    try {
      candidates = await this.findFiles(location.baseRepositoryDir, location.pattern);
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        throw new MissingResourceError(
          location.baseRepositoryDir,
          `'${repository}' could not be found, run setup first.`,
        );
      }
      throw error;
    }

    if (candidates.length === 0) {
      throw new MissingResourceError(
        repository,
        `${repository} does not have a casc file!`,
      );
    }
    if (candidates.length > 1) {
      throw new AmbiguousResourceError(repository, candidates);
    }
    return path.join(location.baseRepositoryDir, candidates[0]);
  }

  async readText(filePath: string): Promise<string> {
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (error) {
      const code = errorCode(error);
      if (code === "ENOENT" || code === "EISDIR") {
        throw new MissingResourceError(filePath, `could not find file: ${filePath}`);
      }
      if (code === "EACCES" || code === "EPERM") {
        throw new MissingResourceError(
          filePath,
          `a particular file/path was unaccessible, ${path.resolve(filePath)}`,
        );
      }
      throw error;
    }
  }

  async readDocument(filePath: string): Promise<ConfigDocument> {
    const source = await this.readText(filePath);
    return parseConfigDocument(source, filePath);
  }

  async remove(target: string): Promise<boolean> {
    try {
      await fs.access(target);
    } catch {
      return false;
    }
    await fs.rm(target, { recursive: true, force: true });
    return true;
  }
}
