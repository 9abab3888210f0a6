export const CLI_COMMANDS = Symbol("CLI_COMMANDS");

export const CLI_PROGRAM_NAME = "casc-assembler";

/**
 * - `value`: takes the next token; the last occurrence wins, except for keys
 *   listed in {@link REPEATABLE_VALUE_KEYS}, which collect every occurrence.
 * - `variadic`: takes every following token up to the next option.
 * - `boolean`: takes nothing.
 */
export type CliOptionKind = "value" | "variadic" | "boolean";

export interface CliOptionDefinition {
  readonly flags: readonly string[];
  readonly runtimeKey: string;
  readonly kind: CliOptionKind;
  readonly description: string;
  /** Commands that accept the option; global when omitted. */
  readonly commands?: readonly string[];
}

const ASSEMBLY_COMMANDS = ["addjobs", "addagent-placeholder"] as const;

export const CLI_OPTIONS: readonly CliOptionDefinition[] = [
  {
    flags: ["-c", "--casc-path"],
    runtimeKey: "cascPath",
    commands: ASSEMBLY_COMMANDS,
    kind: "value",
    description: "load custom casc instead from the default",
  },
  {
    flags: ["-m", "--merge-casc"],
    runtimeKey: "mergeCasc",
    commands: ASSEMBLY_COMMANDS,
    kind: "value",
    description: "merge another casc file into the loaded casc",
  },
  {
    flags: ["-e", "--env"],
    runtimeKey: "env",
    commands: ASSEMBLY_COMMANDS,
    kind: "variadic",
    description: "set environment variables, format: '<key>=<value>'",
  },
  {
    flags: ["-t", "--transform-rffw"],
    runtimeKey: "transformRffw",
    commands: ["addjobs"],
    kind: "boolean",
    description: "transform readFileFromWorkspace calls for use without a workspace",
  },
  {
    flags: ["-n", "--numagents"],
    runtimeKey: "numAgents",
    commands: ["addagent-placeholder"],
    kind: "value",
    description: "number of agents (with their placeholders) to add",
  },
  {
    flags: ["-c", "--clean"],
    runtimeKey: "clean",
    commands: ["setup"],
    kind: "boolean",
    description: "remove the checkouts added by setup",
  },
  {
    flags: ["-o", "--opt"],
    runtimeKey: "opt",
    commands: ["docker-build"],
    kind: "value",
    description: "pass options to 'docker build', e.g. --opt '-t image:latest'",
  },
  {
    flags: ["-r", "--release"],
    runtimeKey: "release",
    commands: ["docker-build"],
    kind: "boolean",
    description: "perform a docker build that is considered non-testing",
  },
  {
    flags: ["-O", "--output"],
    runtimeKey: "output",
    commands: ASSEMBLY_COMMANDS,
    kind: "value",
    description: "write the assembled document to a file instead of stdout",
  },
  {
    flags: ["--config"],
    runtimeKey: "config",
    kind: "value",
    description: "path to the casc-assembler configuration file",
  },
  {
    flags: ["--log-level"],
    runtimeKey: "logLevel",
    kind: "value",
    description: "silent, error, warn, info or debug",
  },
  {
    flags: ["--log-file"],
    runtimeKey: "logFile",
    kind: "value",
    description: "write logs to a file",
  },
];

export const REPEATABLE_VALUE_KEYS: ReadonlySet<string> = new Set(["opt"]);

const appliesTo = (definition: CliOptionDefinition, command: string): boolean =>
  definition.commands === undefined || definition.commands.includes(command);

const isKnownCommand = (command: string): boolean =>
  CLI_OPTIONS.some((definition) => definition.commands?.includes(command));

/**
 * Looks up `flag` as `command` understands it, so a short flag can mean
 * different options for different commands (`-c` is `--clean` for `setup`).
 * Commands no option names fall back to the first definition of the flag and
 * are rejected later by the runner.
 */
export function findCliOption(
  command: string,
  flag: string,
): CliOptionDefinition | undefined {
  const name = command.toLowerCase();
  const candidates = CLI_OPTIONS.filter((definition) =>
    definition.flags.includes(flag),
  );
  if (!isKnownCommand(name)) {
    return candidates[0];
  }
  return candidates.find((definition) => appliesTo(definition, name));
}
