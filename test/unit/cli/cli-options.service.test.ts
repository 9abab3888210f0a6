import { describe, expect, it } from "vitest";
import {
  CliOptionsService,
  parsePositiveInteger,
} from "../../../src/cli/cli-options.service";
import { CliParseError } from "../../../src/cli/cli-parser.service";
import { InvalidNodeCountError } from "../../../src/core/errors";

describe("CliOptionsService", () => {
  const service = new CliOptionsService();

  it("fills in defaults", () => {
    expect(service.parse({})).toEqual({
      runtime: {},
      env: [],
      transformReadFileFromWorkspace: false,
      numAgents: 1,
      clean: false,
      dockerOptions: [],
      release: false,
    });
  });

  it("maps parsed flags onto command options", () => {
    expect(
      service.parse({
        cascPath: "casc.yaml",
        mergeCasc: "extra.yaml",
        env: ["A=1"],
        transformRffw: true,
        numAgents: "3",
        opt: ["--pull"],
        release: true,
        output: "out.yaml",
        config: "tool.yaml",
        logLevel: "debug",
        logFile: "run.log",
      }),
    ).toEqual({
      runtime: { config: "tool.yaml", logLevel: "debug", logFile: "run.log" },
      cascPath: "casc.yaml",
      mergeCascPath: "extra.yaml",
      env: ["A=1"],
      transformReadFileFromWorkspace: true,
      numAgents: 3,
      clean: false,
      dockerOptions: ["--pull"],
      release: true,
      output: "out.yaml",
    });
  });

  it("rejects an unknown log level", () => {
    expect(() => service.parse({ logLevel: "loud" })).toThrow(
      new CliParseError(
        "Invalid log level: loud (expected silent, error, warn, info, debug)",
      ),
    );
  });

  it("rejects a non-numeric agent count", () => {
    expect(() => service.parse({ numAgents: "two" })).toThrow(InvalidNodeCountError);
  });
});

describe("parsePositiveInteger", () => {
  it.each([
    ["1", 1],
    [" 12 ", 12],
    [4, 4],
  ])("reads %j as %d", (value, expected) => {
    expect(parsePositiveInteger(value)).toBe(expected);
  });

  it.each([
    "0",
    "-1",
    "1.5",
    "2x",
    "",
    "100000000000000000000",
    0,
    2.5,
    Number.MAX_SAFE_INTEGER + 2,
  ])("rejects %j", (value) => {
    expect(() => parsePositiveInteger(value)).toThrow(InvalidNodeCountError);
  });
});
