import { isMap } from "yaml";
import {
  cloneNode,
  isAbsent,
  keyOf,
  requireMappingRoot,
  resolveAlias,
  type ConfigDocument,
  type MappingNode,
} from "./config-document";

export interface MergeDocuments {
  source?: ConfigDocument;
  target?: ConfigDocument;
}

/**
 * Merges `source` into `target` in place.
 *
 * - a key missing from `target` (or holding null) receives a copy of the
 *   source subtree;
 * - two mappings under the same key are merged recursively;
 * - any other collision copies every source key of the current level over
 *   the target level, including keys that were merged recursively earlier in
 *   the same pass. Target keys absent from `source` survive.
 *
 * Source always wins a conflict, so merging is not commutative. Aliases are
 * followed in the document they belong to, which `documents` names; copied
 * subtrees carry no aliases or anchors.
 */
export function mergeMappings(
  source: MappingNode,
  target: MappingNode,
  documents: MergeDocuments = {},
): void {
  const pending: Array<[MappingNode, MappingNode]> = [[source, target]];

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) {
      break;
    }
    const [from, into] = next;
    const descend: Array<[MappingNode, MappingNode]> = [];
    let overwritten = false;

    for (const pair of from.items) {
      const key = keyOf(pair);
      const existing = resolveAlias(into.get(key, true), documents.target);
      const incoming = resolveAlias(pair.value, documents.source);

      if (isAbsent(existing)) {
        into.set(key, cloneNode(incoming, documents.source));
        continue;
      }

      if (isMap(existing) && isMap(incoming)) {
        descend.push([incoming, existing]);
        continue;
      }

      overwriteLevel(from, into, documents.source);
      overwritten = true;
      break;
    }

    if (!overwritten) {
      // Reverse so the stack visits children in document order.
      pending.push(...descend.reverse());
    }
  }
}

export function mergeDocuments(
  source: ConfigDocument,
  target: ConfigDocument,
): void {
  mergeMappings(
    requireMappingRoot(source, "merge source"),
    requireMappingRoot(target, "merge target"),
    { source, target },
  );
}

function overwriteLevel(
  from: MappingNode,
  into: MappingNode,
  document?: ConfigDocument,
): void {
  for (const pair of from.items) {
    into.set(keyOf(pair), cloneNode(pair.value, document));
  }
}
