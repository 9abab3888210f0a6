import { InvalidNodeCountError } from "../errors";
import {
  ensureMapping,
  ensureSequence,
  requireMappingRoot,
  type ConfigDocument,
} from "../document/config-document";

export const NODES_ROOT_KEY = "jenkins";
export const NODES_LIST_KEY = "nodes";

export const NODE_VARIABLE_PREFIXES = {
  name: "JENKINS_AGENT_NAME",
  nodeDescription: "JENKINS_AGENT_DESC",
  numExecutors: "JENKINS_AGENT_NUM_EXECUTORS",
  remoteFS: "JENKINS_AGENT_REMOTE_ROOT_DIR",
} as const;

export const NODE_RETENTION_STRATEGY = "always";

export const MAX_NODE_PLACEHOLDERS = 1000;

export interface NodeDescriptor {
  permanent: {
    launcher: {
      jnlp: {
        workDirSettings: {
          disabled: boolean;
          failIfWorkDirIsMissing: boolean;
          internalDir: string;
        };
      };
    };
    name: string;
    nodeDescription: string;
    numExecutors: string;
    remoteFS: string;
    retentionStrategy: string;
  };
}

const deferred = (prefix: string, index: number): string =>
  `\${${prefix}${index}}`;

export function createNodeDescriptor(index: number): NodeDescriptor {
  return {
    permanent: {
      launcher: {
        jnlp: {
          workDirSettings: {
            disabled: false,
            failIfWorkDirIsMissing: false,
            internalDir: "remoting",
          },
        },
      },
      name: deferred(NODE_VARIABLE_PREFIXES.name, index),
      nodeDescription: deferred(NODE_VARIABLE_PREFIXES.nodeDescription, index),
      numExecutors: deferred(NODE_VARIABLE_PREFIXES.numExecutors, index),
      remoteFS: deferred(NODE_VARIABLE_PREFIXES.remoteFS, index),
      retentionStrategy: NODE_RETENTION_STRATEGY,
    },
  };
}

export function assertNodeCount(count: number): void {
  if (!Number.isSafeInteger(count) || count < 1) {
    throw new InvalidNodeCountError(count);
  }
  if (count > MAX_NODE_PLACEHOLDERS) {
    throw new InvalidNodeCountError(count, MAX_NODE_PLACEHOLDERS);
  }
}

/**
 * Appends `count` agent placeholders, indexed from 1, to `jenkins.nodes`. The
 * fields reference environment variables the server resolves when the
 * container starts, e.g. `${JENKINS_AGENT_NAME1}`.
 */
export function generateNodePlaceholders(
  document: ConfigDocument,
  count: number,
): void {
  assertNodeCount(count);

  const root = requireMappingRoot(document);
  const settings = ensureMapping(root, NODES_ROOT_KEY, NODES_ROOT_KEY);
  const nodes = ensureSequence(
    settings,
    NODES_LIST_KEY,
    `${NODES_ROOT_KEY}.${NODES_LIST_KEY}`,
  );

  for (let index = 1; index <= count; index += 1) {
    nodes.add(document.createNode(createNodeDescriptor(index)));
  }
}
