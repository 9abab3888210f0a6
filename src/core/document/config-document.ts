import {
  Document,
  isAlias,
  isMap,
  isNode,
  isScalar,
  isSeq,
  parseDocument,
  visit,
  YAMLMap,
  YAMLSeq,
  type Pair,
  type Scalar,
} from "yaml";
import { DocumentParseError, DocumentShapeError } from "../errors";

export type ConfigDocument = Document;
export type MappingNode = YAMLMap<unknown, unknown>;
export type SequenceNode = YAMLSeq<unknown>;

export const DEFAULT_LINE_WIDTH = 1000;

export interface SerializeOptions {
  lineWidth?: number;
}

/**
 * Parses YAML text into a mapping-rooted document. An empty source yields an
 * empty mapping so callers can always inject into the root.
 */
export function parseConfigDocument(
  source: string,
  origin = "document",
): ConfigDocument {
  const document = parseDocument(source);
  if (document.errors.length > 0) {
    throw new DocumentParseError(
      origin,
      document.errors.map((error) => error.message),
    );
  }

  requireMappingRoot(document, origin);
  return document;
}

export function serializeConfigDocument(
  document: ConfigDocument,
  options: SerializeOptions = {},
): string {
  return document.toString({
    lineWidth: options.lineWidth ?? DEFAULT_LINE_WIDTH,
  });
}

export function requireMappingRoot(
  document: ConfigDocument,
  origin = "document",
): MappingNode {
  const { contents } = document;
  if (isAbsent(contents)) {
    const root = new YAMLMap<unknown, unknown>();
    document.contents = root;
    return root;
  }

  if (!isMap(contents)) {
    throw new DocumentShapeError(`${origin} must have a mapping at its root.`);
  }

  return contents;
}

export function keyOf(pair: Pair<unknown, unknown>): unknown {
  return isScalar(pair.key) ? pair.key.value : pair.key;
}

/** True for a missing value and for an explicit YAML null (`key:` or `key: ~`). */
export function isAbsent(value: unknown): boolean {
  if (value === null || value === undefined) {
    return true;
  }

  return isScalar(value) && (value.value === null || value.value === undefined);
}

/** Follows an alias to its anchored node in `document`; other values pass through. */
export function resolveAlias(value: unknown, document?: ConfigDocument): unknown {
  if (!isAlias(value) || !document) {
    return value;
  }
  return value.resolve(document) ?? value;
}

const dropAnchor = (
  _key: unknown,
  node: Scalar | YAMLMap | YAMLSeq,
): void => {
  node.anchor = undefined;
};

/**
 * Deep copy of `value` that can live in another document: aliases are
 * replaced by copies of the nodes they point to in `document`, and anchors are
 * dropped so they cannot clash with anchors of the receiving document.
 */
export function cloneNode(value: unknown, document?: ConfigDocument): unknown {
  const resolved = resolveAlias(value, document);
  if (!isNode(resolved)) {
    return resolved;
  }

  const copy = resolved.clone();
  if (!isNode(copy)) {
    return copy;
  }

  visit(copy, {
    Alias: (_key, alias) => {
      const target = document ? alias.resolve(document)?.clone() : undefined;
      return isNode(target) ? target : undefined;
    },
    Map: dropAnchor,
    Seq: dropAnchor,
    Scalar: dropAnchor,
  });
  return copy;
}

export function ensureMapping(
  parent: MappingNode,
  key: string,
  path: string,
): MappingNode {
  const existing = parent.get(key, true);
  if (isAbsent(existing)) {
    const created = new YAMLMap<unknown, unknown>();
    parent.set(key, created);
    return created;
  }

  if (!isMap(existing)) {
    throw new DocumentShapeError(`${path} must be a mapping.`);
  }

  return existing;
}

export function ensureSequence(
  parent: MappingNode,
  key: string,
  path: string,
): SequenceNode {
  const existing = parent.get(key, true);
  if (isAbsent(existing)) {
    const created = new YAMLSeq<unknown>();
    parent.set(key, created);
    return created;
  }

  if (!isSeq(existing)) {
    throw new DocumentShapeError(`${path} must be a list.`);
  }

  return existing;
}
