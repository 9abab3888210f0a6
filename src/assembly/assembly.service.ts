import { Inject, Injectable } from "@nestjs/common";
import path from "path";
import type { AssemblerConfig } from "../config/types";
import {
  serializeConfigDocument,
  type ConfigDocument,
} from "../core/document/config-document";
import { mergeDocuments } from "../core/document/document-merger";
import {
  assertNodeCount,
  generateNodePlaceholders,
} from "../core/nodes/node-placeholder-generator";
import { injectScripts, type ScriptFragment } from "../core/scripts/script-injector";
import { rewriteWorkspaceReferences } from "../core/scripts/workspace-reference-rewriter";
import {
  expandVariables,
  parseEnvironmentBindings,
  type EnvironmentBindings,
} from "../core/variables/text-variable-expander";
import { LoggerService } from "../io/logger.service";
import {
  repositoryNameFromUrl,
  WorkspaceService,
} from "../workspace/workspace.service";

export interface AssemblySessionOptions {
  /** Base document; defaults to the one found in the base image checkout. */
  cascPath?: string;
  /** Fragment merged over the base document after injection. */
  mergeCascPath?: string;
  /** Raw `name=value` bindings expanded into the rendered document. */
  env?: readonly string[];
}

export interface AddJobsOptions extends AssemblySessionOptions {
  transformReadFileFromWorkspace?: boolean;
}

export interface AddAgentPlaceholdersOptions extends AssemblySessionOptions {
  count: number;
}

export interface SkippedRepository {
  repository: string;
  reason: "missing" | "ambiguous";
  candidates: string[];
}

export interface AssemblyResult {
  document: string;
  injected: string[];
  skipped: SkippedRepository[];
}

interface AssemblySession {
  bindings: EnvironmentBindings;
  document: ConfigDocument;
  fragment?: ConfigDocument;
}

@Injectable()
export class AssemblyService {
  constructor(
    @Inject(WorkspaceService) private readonly workspace: WorkspaceService,
    @Inject(LoggerService) private readonly loggerService: LoggerService,
  ) {}

  async addJobs(
    config: AssemblerConfig,
    options: AddJobsOptions,
    cwd: string = process.cwd(),
  ): Promise<AssemblyResult> {
    const bindings = parseEnvironmentBindings(options.env ?? []);
    const projectsDir = path.resolve(cwd, config.projectsDir);
    const repositories = await this.workspace.listRepositories(projectsDir);
    const session = await this.openSession(config, options, bindings, cwd);
    const logger = this.loggerService.getLogger("assembly:addjobs");
    const pattern = new RegExp(config.patterns.scriptSource);
    const stagingDirectory = path.basename(config.projectsDir);

    const fragments: ScriptFragment[] = [];
    const skipped: SkippedRepository[] = [];

    for (const repository of repositories) {
      const selection = await this.workspace.selectScriptSource(
        projectsDir,
        repository,
        pattern,
      );

      if (selection.status === "missing") {
        logger.warn({ repository }, `${repository} does not have a job-dsl file, skip`);
        skipped.push({ repository, reason: "missing", candidates: [] });
        continue;
      }

      if (selection.status === "ambiguous") {
        logger.warn(
          { repository, candidates: selection.candidates },
          `${repository} has more than one job-dsl file, skip!`,
        );
        skipped.push({
          repository,
          reason: "ambiguous",
          candidates: selection.candidates,
        });
        continue;
      }

      const text = await this.workspace.readText(selection.path);
      fragments.push({
        source: repository,
        text: options.transformReadFileFromWorkspace
          ? rewriteWorkspaceReferences(repository, text, { stagingDirectory })
          : text,
      });
    }

    injectScripts(session.document, fragments);
    logger.debug({ injected: fragments.length }, "Injected job scripts");

    return {
      document: this.finish(session, config),
      injected: fragments.map((fragment) => fragment.source),
      skipped,
    };
  }

  async addAgentPlaceholders(
    config: AssemblerConfig,
    options: AddAgentPlaceholdersOptions,
    cwd: string = process.cwd(),
  ): Promise<AssemblyResult> {
    assertNodeCount(options.count);
    const bindings = parseEnvironmentBindings(options.env ?? []);
    const session = await this.openSession(config, options, bindings, cwd);

    generateNodePlaceholders(session.document, options.count);
    this.loggerService
      .getLogger("assembly:addagent-placeholder")
      .debug({ count: options.count }, "Added agent placeholders");

    return {
      document: this.finish(session, config),
      injected: [],
      skipped: [],
    };
  }

  /** Loads every document the session needs before anything is mutated. */
  private async openSession(
    config: AssemblerConfig,
    options: AssemblySessionOptions,
    bindings: EnvironmentBindings,
    cwd: string,
  ): Promise<AssemblySession> {
    const basePath = await this.workspace.resolveBaseDocumentPath({
      explicitPath: options.cascPath ? path.resolve(cwd, options.cascPath) : undefined,
      baseRepositoryDir: path.resolve(
        cwd,
        repositoryNameFromUrl(config.baseImage.repositoryUrl),
      ),
      pattern: new RegExp(config.patterns.baseDocument),
    });
    const document = await this.workspace.readDocument(basePath);
    const fragment = options.mergeCascPath
      ? await this.workspace.readDocument(path.resolve(cwd, options.mergeCascPath))
      : undefined;

    this.loggerService
      .getLogger("assembly")
      .debug({ basePath, mergeCascPath: options.mergeCascPath }, "Loaded documents");

    return { bindings, document, fragment };
  }

  private finish(session: AssemblySession, config: AssemblerConfig): string {
    if (session.fragment) {
      mergeDocuments(session.fragment, session.document);
    }

    const rendered = serializeConfigDocument(session.document, {
      lineWidth: config.output.lineWidth,
    });
    return expandVariables(rendered, session.bindings);
  }
}
