import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { AmbiguousResourceError, MissingResourceError } from "../../../src/core/errors";
import {
  repositoryNameFromUrl,
  WorkspaceService,
} from "../../../src/workspace/workspace.service";

const SCRIPT_PATTERN = /.*job-dsl.*/;
const BASE_PATTERN = /^.*casc.*\.ya?ml$/;

describe("repositoryNameFromUrl", () => {
  it.each([
    ["https://example.test/org/alpha", "alpha"],
    ["https://example.test/org/alpha.git", "alpha.git"],
    ["https://example.test/org/alpha/", "alpha"],
  ])("names %s as %s", (url, name) => {
    expect(repositoryNameFromUrl(url)).toBe(name);
  });
});

describe("WorkspaceService", () => {
  const service = new WorkspaceService();
  let root: string;
  let projectsDir: string;

  const write = async (relative: string, contents = "") => {
    const target = path.join(root, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, contents);
  };

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "casc-workspace-"));
    projectsDir = path.join(root, "projects");
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe("listRepositories", () => {
    it("lists checkout directories by name", async () => {
      await write("projects/beta/README.md");
      await write("projects/alpha/README.md");
      await write("projects/notes.txt");

      await expect(service.listRepositories(projectsDir)).resolves.toEqual([
        "alpha",
        "beta",
      ]);
    });

    it("asks for setup when the projects directory is missing", async () => {
      await expect(service.listRepositories(projectsDir)).rejects.toThrow(
        new MissingResourceError(
          projectsDir,
          "'projects' could not be found, run setup first.",
        ),
      );
    });
  });

  describe("selectScriptSource", () => {
    it("selects the single matching file", async () => {
      await write("projects/alpha/alpha-job-dsl.groovy");
      await write("projects/alpha/Jenkinsfile");

      await expect(
        service.selectScriptSource(projectsDir, "alpha", SCRIPT_PATTERN),
      ).resolves.toEqual({
        status: "selected",
        repository: "alpha",
        path: path.join(projectsDir, "alpha", "alpha-job-dsl.groovy"),
      });
    });

    it("reports a repository without a match", async () => {
      await write("projects/alpha/Jenkinsfile");

      await expect(
        service.selectScriptSource(projectsDir, "alpha", SCRIPT_PATTERN),
      ).resolves.toEqual({ status: "missing", repository: "alpha" });
    });

    it("reports every candidate when more than one file matches", async () => {
      await write("projects/alpha/b-job-dsl.groovy");
      await write("projects/alpha/a-job-dsl.groovy");

      await expect(
        service.selectScriptSource(projectsDir, "alpha", SCRIPT_PATTERN),
      ).resolves.toEqual({
        status: "ambiguous",
        repository: "alpha",
        candidates: ["a-job-dsl.groovy", "b-job-dsl.groovy"],
      });
    });

    it("ignores directories whose names match", async () => {
      await write("projects/alpha/job-dsl/nested.groovy");

      await expect(
        service.selectScriptSource(projectsDir, "alpha", SCRIPT_PATTERN),
      ).resolves.toEqual({ status: "missing", repository: "alpha" });
    });
  });

  describe("resolveBaseDocumentPath", () => {
    const baseDir = () => path.join(root, "jenkins-docker-base");

    it("prefers an explicit path", async () => {
      await expect(
        service.resolveBaseDocumentPath({
          explicitPath: path.join(root, "custom.yaml"),
          baseRepositoryDir: baseDir(),
          pattern: BASE_PATTERN,
        }),
      ).resolves.toBe(path.join(root, "custom.yaml"));
    });

    it("finds the single document in the base checkout", async () => {
      await write("jenkins-docker-base/casc.yaml");
      await write("jenkins-docker-base/Dockerfile");

      await expect(
        service.resolveBaseDocumentPath({
          baseRepositoryDir: baseDir(),
          pattern: BASE_PATTERN,
        }),
      ).resolves.toBe(path.join(baseDir(), "casc.yaml"));
    });

    it("fails without a document", async () => {
      await write("jenkins-docker-base/Dockerfile");

      await expect(
        service.resolveBaseDocumentPath({
          baseRepositoryDir: baseDir(),
          pattern: BASE_PATTERN,
        }),
      ).rejects.toThrow("jenkins-docker-base does not have a casc file!");
    });

    it("fails with more than one document", async () => {
      await write("jenkins-docker-base/casc.yaml");
      await write("jenkins-docker-base/casc-extra.yml");

      await expect(
        service.resolveBaseDocumentPath({
          baseRepositoryDir: baseDir(),
          pattern: BASE_PATTERN,
        }),
      ).rejects.toBeInstanceOf(AmbiguousResourceError);
    });

    it("asks for setup when the base checkout is missing", async () => {
      await expect(
        service.resolveBaseDocumentPath({
          baseRepositoryDir: baseDir(),
          pattern: BASE_PATTERN,
        }),
      ).rejects.toThrow("'jenkins-docker-base' could not be found, run setup first.");
    });
  });

  describe("files", () => {
    it("reads a document", async () => {
      await write("casc.yaml", "jenkins:\n  systemMessage: hi\n");

      const document = await service.readDocument(path.join(root, "casc.yaml"));

      expect(document.toJS()).toEqual({ jenkins: { systemMessage: "hi" } });
    });

    it("names a missing file", async () => {
      const missing = path.join(root, "missing.yaml");

      await expect(service.readText(missing)).rejects.toThrow(
        `could not find file: ${missing}`,
      );
    });

    it("removes a directory and reports whether it existed", async () => {
      await write("projects/alpha/README.md");

      await expect(service.remove(projectsDir)).resolves.toBe(true);
      await expect(service.remove(projectsDir)).resolves.toBe(false);
      await expect(fs.access(projectsDir)).rejects.toThrow();
    });
  });
});
