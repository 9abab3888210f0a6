/**
 * Base class for every failure the assembler reports to its caller. The CLI
 * prints `message` and exits non-zero; nothing below it recovers.
 */
export class CascAssemblerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidEnvironmentBindingError extends CascAssemblerError {
  constructor(readonly binding: string) {
    super(`'${binding}' env var is not formatted correctly, expected <key>=<value>.`);
  }
}

export class InvalidNodeCountError extends CascAssemblerError {
  constructor(
    readonly count: unknown,
    readonly limit?: number,
  ) {
    super(
      limit === undefined
        ? `Number of agents must be a positive integer, received ${String(count)}.`
        : `Number of agents must not exceed ${limit}, received ${String(count)}.`,
    );
  }
}

export class DocumentParseError extends CascAssemblerError {
  constructor(
    readonly origin: string,
    readonly details: string[],
  ) {
    super(`Unable to parse ${origin}: ${details.join("; ")}`);
  }
}

export class DocumentShapeError extends CascAssemblerError {}

export class MissingResourceError extends CascAssemblerError {
  constructor(
    readonly resource: string,
    message?: string,
  ) {
    super(message ?? `Could not find ${resource}.`);
  }
}

export class AmbiguousResourceError extends CascAssemblerError {
  constructor(
    readonly resource: string,
    readonly candidates: string[],
  ) {
    super(`${resource} has more than one candidate: ${candidates.join(", ")}.`);
  }
}

export class ProcessExecutionError extends CascAssemblerError {
  constructor(
    readonly command: string[],
    readonly exitCode: number | null,
    readonly stderr: string,
  ) {
    const suffix = stderr.trim() ? `: ${stderr.trim()}` : "";
    super(
      `cmd ${command.join(" ")} returned non-zero exit status ${String(exitCode)}${suffix}`,
    );
  }
}
