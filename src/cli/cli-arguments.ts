export interface CliArguments {
  /**
   * The name of the command to execute (e.g. `addjobs`, `setup`).
   */
  readonly command: string;
  /**
   * Positional arguments that follow the command name.
   */
  readonly positionals: string[];
  /**
   * Raw option map keyed by camelCase runtime keys (e.g. `mergeCasc`).
   */
  readonly options: Record<string, unknown>;
}
