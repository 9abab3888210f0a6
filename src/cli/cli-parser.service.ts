import { Injectable } from "@nestjs/common";
import type { CliArguments } from "./cli-arguments";
import {
  findCliOption,
  REPEATABLE_VALUE_KEYS,
  type CliOptionDefinition,
} from "./cli.constants";

export class CliParseError extends Error {}

// A dash followed by whitespace reads as a value (`--opt '-t image:v1'`).
const isOptionToken = (token: string): boolean =>
  token.length > 1 && token.startsWith("-") && !/\s/.test(token);

@Injectable()
export class CliParserService {
  parse(argv: string[]): CliArguments {
    if (argv.length === 0) {
      throw new CliParseError("No command provided.");
    }

    const [command, ...rest] = argv;
    if (!command || command.startsWith("-")) {
      throw new CliParseError(`Invalid command: ${command ?? "<empty>"}`);
    }

    const options: Record<string, unknown> = {};
    const positionals: string[] = [];

    for (let i = 0; i < rest.length; i += 1) {
      const token = rest[i];
      if (token === "--") {
        positionals.push(...rest.slice(i + 1));
        break;
      }

      if (!isOptionToken(token)) {
        positionals.push(token);
        continue;
      }

      const [flag, inlineValue] = this.splitInlineValue(token);
      const definition = findCliOption(command, flag);
      if (!definition) {
        throw new CliParseError(`Unknown option: ${flag}`);
      }

      if (definition.kind === "boolean") {
        if (inlineValue !== undefined) {
          throw new CliParseError(`Option ${flag} does not take a value.`);
        }
        options[definition.runtimeKey] = true;
        continue;
      }

      if (definition.kind === "variadic") {
        const values = inlineValue !== undefined ? [inlineValue] : [];
        while (
          i + 1 < rest.length &&
          rest[i + 1] !== "--" &&
          !isOptionToken(rest[i + 1])
        ) {
          i += 1;
          values.push(rest[i]);
        }
        if (values.length === 0) {
          throw new CliParseError(`Option ${flag} requires at least one value.`);
        }
        this.appendValues(options, definition, values);
        continue;
      }

      let value = inlineValue;
      if (value === undefined) {
        const next = rest[i + 1];
        if (next === undefined || isOptionToken(next)) {
          throw new CliParseError(`Option ${flag} requires a value.`);
        }
        i += 1;
        value = next;
      }

      if (REPEATABLE_VALUE_KEYS.has(definition.runtimeKey)) {
        this.appendValues(options, definition, [value]);
      } else {
        options[definition.runtimeKey] = value;
      }
    }

    return { command, options, positionals };
  }

  private splitInlineValue(token: string): [string, string | undefined] {
    if (!token.startsWith("--")) {
      return [token, undefined];
    }
    const separator = token.indexOf("=");
    if (separator === -1) {
      return [token, undefined];
    }
    return [token.slice(0, separator), token.slice(separator + 1)];
  }

  private appendValues(
    options: Record<string, unknown>,
    definition: CliOptionDefinition,
    values: string[],
  ): void {
    const existing = options[definition.runtimeKey];
    options[definition.runtimeKey] = Array.isArray(existing)
      ? [...existing, ...values]
      : values;
  }
}
