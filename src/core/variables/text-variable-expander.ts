import { InvalidEnvironmentBindingError } from "../errors";

export type EnvironmentBindings = ReadonlyMap<string, string>;

const BINDING_PATTERN = /^([A-Za-z_]\w*)=(.+)$/s;
const VARIABLE_REFERENCE_PATTERN = /\$\{(\w+)\}|\$([A-Za-z_]\w*)/g;

/**
 * Parses `name=value` strings as typed on the command line. Every binding is
 * checked before any is returned; the value is everything after the first
 * `=`, and a later binding for the same name wins.
 */
export function parseEnvironmentBindings(
  raw: readonly string[],
): EnvironmentBindings {
  const bindings = new Map<string, string>();

  for (const entry of raw) {
    const match = BINDING_PATTERN.exec(entry);
    if (!match) {
      throw new InvalidEnvironmentBindingError(entry);
    }
    bindings.set(match[1], match[2]);
  }

  return bindings;
}

/**
 * Substitutes `${NAME}` and `$NAME` references line by line. References
 * without a binding are kept verbatim for the server to resolve later.
 */
export function expandVariables(
  text: string,
  bindings: readonly string[] | EnvironmentBindings,
): string {
  const resolved = isBindingMap(bindings)
    ? bindings
    : parseEnvironmentBindings(bindings);

  if (resolved.size === 0) {
    return text;
  }

  return text
    .split(/(?<=\n)/)
    .map((line) => expandLine(line, resolved))
    .join("");
}

function expandLine(line: string, bindings: EnvironmentBindings): string {
  return line.replace(
    VARIABLE_REFERENCE_PATTERN,
    (reference: string, braced: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare ?? "";
      return bindings.get(name) ?? reference;
    },
  );
}

function isBindingMap(
  value: readonly string[] | EnvironmentBindings,
): value is EnvironmentBindings {
  return value instanceof Map;
}
