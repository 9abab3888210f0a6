import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import {
  ConfigService,
  ConfigValidationError,
} from "../../../src/config/config.service";
import { DEFAULT_CONFIG } from "../../../src/config/defaults";

describe("ConfigService", () => {
  const service = new ConfigService();
  let cwd: string;

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "casc-config-"));
  });

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true });
  });

  it("falls back to the defaults without a config file", async () => {
    await expect(service.load({}, cwd)).resolves.toEqual(DEFAULT_CONFIG);
  });

  it("layers a discovered YAML file over the defaults", async () => {
    await fs.writeFile(
      path.join(cwd, "casc-assembler.config.yaml"),
      [
        "projectsDir: staged",
        "repositories:",
        "  - https://example.test/org/alpha.git",
        "patterns:",
        "  scriptSource: '.*\\.groovy$'",
        "logging:",
        "  level: debug",
        "",
      ].join("\n"),
    );

    const config = await service.load({}, cwd);

    expect(config.projectsDir).toBe("staged");
    expect(config.repositories).toEqual(["https://example.test/org/alpha.git"]);
    expect(config.patterns).toEqual({
      scriptSource: ".*\\.groovy$",
      baseDocument: DEFAULT_CONFIG.patterns.baseDocument,
    });
    expect(config.logging.level).toBe("debug");
    expect(config.baseImage).toEqual(DEFAULT_CONFIG.baseImage);
  });

  it("reads an explicit JSON file", async () => {
    await fs.writeFile(
      path.join(cwd, "custom.json"),
      JSON.stringify({ output: { lineWidth: 120 } }),
    );

    const config = await service.load({ config: "custom.json" }, cwd);

    expect(config.output.lineWidth).toBe(120);
  });

  it("fails when an explicit config file is missing", async () => {
    await expect(service.load({ config: "nope.yaml" }, cwd)).rejects.toThrow(
      `Config file not found at ${path.join(cwd, "nope.yaml")}`,
    );
  });

  it("reports schema violations with their location", async () => {
    const file = path.join(cwd, "casc-assembler.config.yaml");
    await fs.writeFile(file, "output:\n  lineWidth: 0\n");

    await expect(service.load({}, cwd)).rejects.toThrow(
      new ConfigValidationError(
        `Invalid configuration in ${file}: output.lineWidth: lineWidth must be greater than zero`,
      ),
    );
  });

  it("rejects patterns that are not regular expressions", () => {
    expect(() =>
      service.parseSource("patterns:\n  scriptSource: '('\n", "yaml", "inline"),
    ).toThrow(
      "Invalid configuration in inline: patterns.scriptSource: pattern must be a valid regular expression",
    );
  });

  it("reports unparsable sources", () => {
    expect(() => service.parseSource("{", "json", "inline")).toThrow(
      /^Unable to parse inline: /,
    );
  });

  it("applies CLI logging overrides", async () => {
    const config = await service.load(
      { logLevel: "warn", logFile: "logs/run.log" },
      cwd,
    );

    expect(config.logging).toEqual({
      level: "warn",
      destination: {
        type: "file",
        path: "logs/run.log",
        pretty: false,
        colorize: false,
      },
      enableTimestamps: true,
    });
    expect(DEFAULT_CONFIG.logging.level).toBe("info");
  });

  describe("jobs.toml project list", () => {
    const projectList = [
      "[git]",
      "repo_urls = [",
      '  "https://example.test/org/alpha.git",',
      '  "https://example.test/org/beta.git",',
      "]",
      "",
    ].join("\n");

    it("supplies the repositories when the config file has none", async () => {
      await fs.writeFile(path.join(cwd, "jobs.toml"), projectList);
      await fs.writeFile(
        path.join(cwd, "casc-assembler.config.yaml"),
        "projectsDir: staged\n",
      );

      const config = await service.load({}, cwd);

      expect(config.repositories).toEqual([
        "https://example.test/org/alpha.git",
        "https://example.test/org/beta.git",
      ]);
      expect(config.projectsDir).toBe("staged");
    });

    it("yields to repositories set in the config file", async () => {
      await fs.writeFile(path.join(cwd, "jobs.toml"), projectList);
      await fs.writeFile(
        path.join(cwd, "casc-assembler.config.yaml"),
        "repositories:\n  - https://example.test/org/gamma.git\n",
      );

      const config = await service.load({}, cwd);

      expect(config.repositories).toEqual(["https://example.test/org/gamma.git"]);
    });

    it("rejects malformed TOML", async () => {
      await fs.writeFile(path.join(cwd, "jobs.toml"), "[git\nrepo_urls = 1\n");

      await expect(service.load({}, cwd)).rejects.toThrow(
        `Unable to parse ${path.join(cwd, "jobs.toml")}: `,
      );
    });

    it("requires a repo_urls list under [git]", () => {
      expect(() =>
        service.parseProjectList('[git]\nrepo_urls = "alpha"\n', "jobs.toml"),
      ).toThrow(ConfigValidationError);
      expect(() => service.parseProjectList("title = 'x'\n", "jobs.toml")).toThrow(
        /^Invalid configuration in jobs\.toml: git: /,
      );
    });
  });
});
