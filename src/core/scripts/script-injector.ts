import { Scalar, YAMLMap } from "yaml";
import {
  ensureSequence,
  requireMappingRoot,
  type ConfigDocument,
} from "../document/config-document";

export const SCRIPT_LIST_KEY = "jobs";
export const SCRIPT_ENTRY_KEY = "script";

export interface ScriptFragment {
  /** Repository (or other source) the script was read from. */
  readonly source: string;
  readonly text: string;
}

/**
 * Appends one `{ script: <text> }` entry per fragment to the `jobs` list, in
 * the order given. The text renders as a literal block so multi-line scripts
 * keep their line breaks. Without fragments the document is left untouched.
 */
export function injectScripts(
  document: ConfigDocument,
  fragments: readonly ScriptFragment[],
): void {
  if (fragments.length === 0) {
    return;
  }

  const root = requireMappingRoot(document);
  const scripts = ensureSequence(root, SCRIPT_LIST_KEY, SCRIPT_LIST_KEY);

  for (const fragment of fragments) {
    scripts.add(createScriptEntry(fragment.text));
  }
}

export function createScriptEntry(text: string): YAMLMap<string, Scalar<string>> {
  const body = new Scalar(text);
  body.type = Scalar.BLOCK_LITERAL;

  const entry = new YAMLMap<string, Scalar<string>>();
  entry.set(SCRIPT_ENTRY_KEY, body);
  return entry;
}
