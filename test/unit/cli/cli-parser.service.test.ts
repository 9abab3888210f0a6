import { describe, expect, it } from "vitest";
import { CliParseError, CliParserService } from "../../../src/cli/cli-parser.service";

describe("CliParserService", () => {
  const parser = new CliParserService();

  it("parses the addjobs options", () => {
    expect(
      parser.parse(["addjobs", "-c", "casc.yaml", "-e", "A=1", "B=2", "-t"]),
    ).toEqual({
      command: "addjobs",
      options: { cascPath: "casc.yaml", env: ["A=1", "B=2"], transformRffw: true },
      positionals: [],
    });
  });

  it("collects env bindings across repeated flags", () => {
    expect(parser.parse(["addjobs", "-e", "A=1", "--env", "B=2"]).options).toEqual({
      env: ["A=1", "B=2"],
    });
  });

  it("keeps positionals and repeatable docker options", () => {
    expect(
      parser.parse(["docker-build", "ci:dev", "--opt", "-t other:dev", "--opt=--pull", "-r"]),
    ).toEqual({
      command: "docker-build",
      options: { opt: ["-t other:dev", "--pull"], release: true },
      positionals: ["ci:dev"],
    });
  });

  it("keeps the last value of a single-value option", () => {
    expect(parser.parse(["addjobs", "-c", "a.yaml", "-c", "b.yaml"]).options).toEqual({
      cascPath: "b.yaml",
    });
  });

  it("treats tokens after -- as positionals", () => {
    expect(parser.parse(["docker-build", "--", "-weird-tag"]).positionals).toEqual([
      "-weird-tag",
    ]);
  });

  it("reads -c as --clean for setup and as --casc-path for the assembly commands", () => {
    expect(parser.parse(["setup", "-c"])).toEqual({
      command: "setup",
      options: { clean: true },
      positionals: [],
    });
    expect(parser.parse(["addjobs", "-c", "x.yaml"]).options).toEqual({
      cascPath: "x.yaml",
    });
    expect(parser.parse(["addagent-placeholder", "-c", "x.yaml", "-n", "2"]).options).toEqual({
      cascPath: "x.yaml",
      numAgents: "2",
    });
  });

  it.each<{ argv: string[]; message: string }>([
    { argv: ["addjobs", "--nope"], message: "Unknown option: --nope" },
    { argv: ["addagent-placeholder", "-n"], message: "Option -n requires a value." },
    { argv: ["setup", "--clean=yes"], message: "Option --clean does not take a value." },
    { argv: ["addjobs", "-e", "-t"], message: "Option -e requires at least one value." },
    { argv: ["-c"], message: "Invalid command: -c" },
    { argv: ["setup", "-e", "A=1"], message: "Unknown option: -e" },
    { argv: ["docker-build", "ci:dev", "-n", "2"], message: "Unknown option: -n" },
    { argv: [], message: "No command provided." },
  ])("rejects $argv", ({ argv, message }) => {
    expect(() => parser.parse(argv)).toThrow(new CliParseError(message));
  });
});
